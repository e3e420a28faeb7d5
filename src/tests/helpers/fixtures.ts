import { ORDER_STATUS, USER_ROLE, USER_STATUS, UserRole, UserStatus } from '../../constants';
import { Order, Service, ServiceOption, ServiceVariant, User } from '../../connections/db/models';
import { OrderConfig } from '../../connections/config/app.config';
import { Actor } from '../../types/request.types';
import { CatalogRepository } from '../../modules/catalog/catalog.repository';
import { UsersRepository } from '../../modules/users/users.repository';
import { AppServices, createServices } from '../../container';
import {
  NotificationDispatcher,
  OrderStatusChangedEvent,
} from '../../modules/notifications/notification.dispatcher';
import { InMemoryOrdersRepository } from './in-memory-orders.repository';

const makeUser = (
  suffix: string,
  role: UserRole,
  name: string,
  overrides: { is_superuser?: boolean; status?: UserStatus } = {}
): User => ({
  id: `00000000-0000-4000-8000-0000000000${suffix}`,
  email: `${name.toLowerCase().replace(/\s+/g, '.')}@example.test`,
  full_name: name,
  role,
  is_superuser: overrides.is_superuser ?? false,
  status: overrides.status ?? USER_STATUS.ACTIVE,
  created_at: new Date('2024-01-01T00:00:00Z'),
  updated_at: new Date('2024-01-01T00:00:00Z'),
});

export const USERS = {
  customer: makeUser('01', USER_ROLE.CUSTOMER, 'Casey Customer'),
  otherCustomer: makeUser('02', USER_ROLE.CUSTOMER, 'Olive Other'),
  press: makeUser('11', USER_ROLE.PRESS, 'Pat Press'),
  otherPress: makeUser('12', USER_ROLE.PRESS, 'Parker Press'),
  delivery: makeUser('21', USER_ROLE.DELIVERY, 'Dana Driver'),
  otherDelivery: makeUser('22', USER_ROLE.DELIVERY, 'Drew Driver'),
  admin: makeUser('31', USER_ROLE.ADMIN, 'Alex Admin'),
  superuser: makeUser('32', USER_ROLE.CUSTOMER, 'Sam Super', { is_superuser: true }),
  banned: makeUser('41', USER_ROLE.CUSTOMER, 'Blake Banned', { status: USER_STATUS.BANNED }),
  inactivePress: makeUser('42', USER_ROLE.PRESS, 'Ira Inactive', { status: USER_STATUS.DELETED }),
};

export const ALL_USERS: readonly User[] = Object.values(USERS);

export const actorFor = (user: User): Actor => ({
  id: user.id,
  email: user.email,
  role: user.role,
  is_superuser: user.is_superuser,
});

export const ACTORS = {
  customer: actorFor(USERS.customer),
  otherCustomer: actorFor(USERS.otherCustomer),
  press: actorFor(USERS.press),
  otherPress: actorFor(USERS.otherPress),
  delivery: actorFor(USERS.delivery),
  otherDelivery: actorFor(USERS.otherDelivery),
  admin: actorFor(USERS.admin),
  superuser: actorFor(USERS.superuser),
};

export const SERVICES: Service[] = [
  { id: 1, name: 'Wash & Fold', base_price: 30, is_active: true },
  { id: 2, name: 'Dry Clean', base_price: 20, is_active: true },
  { id: 3, name: 'Leather Care', base_price: 50, is_active: false },
];

export const VARIANTS: ServiceVariant[] = [
  { id: 10, service_id: 1, name: 'Large', price_adjustment: 5, is_active: true },
  { id: 11, service_id: 1, name: 'Retired', price_adjustment: 2, is_active: false },
  { id: 12, service_id: 2, name: 'Promo', price_adjustment: -25, is_active: true },
  { id: 20, service_id: 2, name: 'Silk', price_adjustment: 7.5, is_active: true },
];

export const OPTIONS: ServiceOption[] = [
  { id: 100, service_id: 1, name: 'Express', price_adjustment: 3, is_active: true },
  { id: 101, service_id: 1, name: 'Fragrance', price_adjustment: 1.5, is_active: true },
  { id: 102, service_id: 2, name: 'Stain removal', price_adjustment: 4, is_active: true },
  { id: 103, service_id: 1, name: 'Starch', price_adjustment: 2, is_active: false },
];

export class InMemoryCatalogRepository implements CatalogRepository {
  constructor(
    private readonly services: Service[] = SERVICES.map((service) => ({ ...service })),
    private readonly variants: ServiceVariant[] = VARIANTS.map((variant) => ({ ...variant })),
    private readonly options: ServiceOption[] = OPTIONS.map((option) => ({ ...option }))
  ) {}

  async findService(serviceId: number): Promise<Service | null> {
    return this.services.find((service) => service.id === serviceId) ?? null;
  }

  async findVariant(variantId: number): Promise<ServiceVariant | null> {
    return this.variants.find((variant) => variant.id === variantId) ?? null;
  }

  async findOptions(optionIds: readonly number[]): Promise<ServiceOption[]> {
    return this.options.filter((option) => optionIds.includes(option.id));
  }

  setBasePrice(serviceId: number, basePrice: number): void {
    const service = this.services.find((candidate) => candidate.id === serviceId);
    if (service) {
      service.base_price = basePrice;
    }
  }
}

export class InMemoryUsersRepository implements UsersRepository {
  constructor(private readonly users: readonly User[] = ALL_USERS) {}

  async findById(userId: string): Promise<User | null> {
    return this.users.find((user) => user.id === userId) ?? null;
  }
}

export class RecordingNotificationDispatcher implements NotificationDispatcher {
  readonly events: OrderStatusChangedEvent[] = [];

  orderStatusChanged(event: OrderStatusChangedEvent): void {
    this.events.push(event);
  }
}

export const TEST_ORDER_CONFIG: OrderConfig = {
  taxRate: 0.1,
  deliveryFee: 5,
  requirePaymentForConfirmation: false,
};

// 2024-03-05T10:00:00Z plus one second per call
export const steppingClock = (start: Date = new Date('2024-03-05T10:00:00Z')) => {
  let tick = 0;
  return () => new Date(start.getTime() + 1000 * tick++);
};

export interface TestContext {
  services: AppServices;
  ordersRepository: InMemoryOrdersRepository;
  catalogRepository: InMemoryCatalogRepository;
  notifications: RecordingNotificationDispatcher;
}

export const buildTestContext = (
  options: { config?: Partial<OrderConfig>; notifications?: NotificationDispatcher; clock?: () => Date } = {}
): TestContext => {
  const clock = options.clock ?? steppingClock();
  const ordersRepository = new InMemoryOrdersRepository({ clock, users: ALL_USERS });
  const catalogRepository = new InMemoryCatalogRepository();
  const notifications = new RecordingNotificationDispatcher();

  const services = createServices({
    ordersRepository,
    catalogRepository,
    usersRepository: new InMemoryUsersRepository(),
    notifications: options.notifications ?? notifications,
    config: { ...TEST_ORDER_CONFIG, ...options.config },
    clock,
  });

  return { services, ordersRepository, catalogRepository, notifications };
};

/**
 * A stored order with every optional field empty
 */
export const buildOrder = (overrides: Partial<Order> = {}): Order => ({
  id: 1,
  order_number: '240305-00001',
  customer_id: USERS.customer.id,
  status: ORDER_STATUS.DRAFT,
  payment_status: 'pending',
  delivery_type: 'pickup',
  pickup_address: null,
  delivery_address: null,
  preferred_pickup_date: null,
  preferred_delivery_date: null,
  subtotal: 0,
  tax_amount: 0,
  shipping_cost: 0,
  discount_amount: 0,
  total_amount: 0,
  assigned_staff_id: null,
  delivery_person_id: null,
  created_at: new Date('2024-03-05T10:00:00Z'),
  updated_at: new Date('2024-03-05T10:00:00Z'),
  confirmed_at: null,
  scheduled_at: null,
  out_for_pickup_at: null,
  picked_up_at: null,
  processing_started_at: null,
  ready_at: null,
  out_for_delivery_at: null,
  completed_at: null,
  cancelled_at: null,
  cancellation_reason: null,
  special_instructions: null,
  internal_notes: null,
  version: 1,
  ...overrides,
});
