import { describe, expect, it } from '@jest/globals';
import { ORDER_STATUS } from '../constants';
import { Order } from '../connections/db/models';
import { ForbiddenError } from '../utils/errors';
import { ACTORS, USERS, buildTestContext } from './helpers/fixtures';

const FIRST_PAGE = { page: 1, limit: 10 };
const ids = (rows: Order[]) => rows.map((order) => order.id);

describe('DashboardService', () => {
  describe('customerQueue', () => {
    const seed = () => {
      const context = buildTestContext();
      const repo = context.ordersRepository;
      const draft = repo.seedOrder({ customer_id: USERS.customer.id });
      const theirs = repo.seedOrder({ customer_id: USERS.otherCustomer.id, status: ORDER_STATUS.PENDING });
      const processing = repo.seedOrder({ customer_id: USERS.customer.id, status: ORDER_STATUS.PROCESSING });
      const completed = repo.seedOrder({ customer_id: USERS.customer.id, status: ORDER_STATUS.COMPLETED });
      return { ...context, draft, theirs, processing, completed };
    };

    it('lists the customer\'s own orders newest first', async () => {
      const { services, draft, processing, completed } = seed();

      const page = await services.dashboard.customerQueue(ACTORS.customer, FIRST_PAGE);

      expect(ids(page.rows)).toEqual([completed.id, processing.id, draft.id]);
      expect(page.total).toBe(3);
    });

    it('narrows to a bucket', async () => {
      const { services, processing, completed } = seed();

      const inProgress = await services.dashboard.customerQueue(ACTORS.customer, { ...FIRST_PAGE, bucket: 'in_progress' });
      const done = await services.dashboard.customerQueue(ACTORS.customer, { ...FIRST_PAGE, bucket: 'done' });

      expect(ids(inProgress.rows)).toEqual([processing.id]);
      expect(ids(done.rows)).toEqual([completed.id]);
    });

    it('pages through the results', async () => {
      const { services, draft } = seed();

      const page = await services.dashboard.customerQueue(ACTORS.customer, { page: 2, limit: 2 });

      expect(ids(page.rows)).toEqual([draft.id]);
      expect(page).toMatchObject({ total: 3, page: 2, limit: 2 });
    });

    it('lets admins look at any customer', async () => {
      const { services, theirs } = seed();

      const one = await services.dashboard.customerQueue(ACTORS.admin, {
        ...FIRST_PAGE,
        customerId: USERS.otherCustomer.id,
      });
      const everyone = await services.dashboard.customerQueue(ACTORS.admin, FIRST_PAGE);

      expect(ids(one.rows)).toEqual([theirs.id]);
      expect(everyone.total).toBe(4);
    });

    it('is closed to staff roles', async () => {
      const { services } = seed();

      await expect(services.dashboard.customerQueue(ACTORS.press, FIRST_PAGE)).rejects.toBeInstanceOf(ForbiddenError);
    });
  });

  it('orders the press queue by workflow position', async () => {
    const { services, ordersRepository: repo } = buildTestContext();
    const ready = repo.seedOrder({ customer_id: USERS.customer.id, status: ORDER_STATUS.READY });
    const confirmed = repo.seedOrder({ customer_id: USERS.customer.id, status: ORDER_STATUS.CONFIRMED });
    repo.seedOrder({ customer_id: USERS.customer.id, status: ORDER_STATUS.CANCELLED });
    const processing = repo.seedOrder({ customer_id: USERS.customer.id, status: ORDER_STATUS.PROCESSING });
    const pickedUp = repo.seedOrder({ customer_id: USERS.customer.id, status: ORDER_STATUS.PICKED_UP });
    const laterConfirmed = repo.seedOrder({ customer_id: USERS.otherCustomer.id, status: ORDER_STATUS.CONFIRMED });
    repo.seedOrder({ customer_id: USERS.customer.id });

    const page = await services.dashboard.pressQueue(ACTORS.press, FIRST_PAGE);

    expect(ids(page.rows)).toEqual([confirmed.id, laterConfirmed.id, pickedUp.id, processing.id, ready.id]);
  });

  it('shows delivery staff open work and their own runs', async () => {
    const { services, ordersRepository: repo } = buildTestContext();
    const scheduled = repo.seedOrder({ customer_id: USERS.customer.id, status: ORDER_STATUS.SCHEDULED_FOR_PICKUP });
    const myPickup = repo.seedOrder({
      customer_id: USERS.customer.id,
      status: ORDER_STATUS.OUT_FOR_PICKUP,
      delivery_person_id: USERS.delivery.id,
    });
    repo.seedOrder({
      customer_id: USERS.customer.id,
      status: ORDER_STATUS.OUT_FOR_PICKUP,
      delivery_person_id: USERS.otherDelivery.id,
    });
    const ready = repo.seedOrder({ customer_id: USERS.customer.id, status: ORDER_STATUS.READY });
    const myDelivery = repo.seedOrder({
      customer_id: USERS.customer.id,
      status: ORDER_STATUS.OUT_FOR_DELIVERY,
      delivery_person_id: USERS.delivery.id,
    });
    repo.seedOrder({
      customer_id: USERS.customer.id,
      status: ORDER_STATUS.COMPLETED,
      delivery_person_id: USERS.delivery.id,
    });

    const page = await services.dashboard.deliveryQueue(ACTORS.delivery, FIRST_PAGE);

    expect(ids(page.rows)).toEqual([scheduled.id, myPickup.id, ready.id, myDelivery.id]);
    await expect(services.dashboard.deliveryQueue(ACTORS.press, FIRST_PAGE)).rejects.toBeInstanceOf(ForbiddenError);
  });

  describe('adminOverview', () => {
    it('counts orders by bucket and ranks staff', async () => {
      const { services, ordersRepository: repo } = buildTestContext();
      const customer_id = USERS.customer.id;
      repo.seedOrder({ customer_id });
      repo.seedOrder({ customer_id, status: ORDER_STATUS.PENDING });
      repo.seedOrder({ customer_id, status: ORDER_STATUS.CONFIRMED });
      repo.seedOrder({ customer_id, status: ORDER_STATUS.PROCESSING });
      repo.seedOrder({ customer_id, status: ORDER_STATUS.READY });
      repo.seedOrder({ customer_id, status: ORDER_STATUS.CANCELLED });
      repo.seedOrder({ customer_id, status: ORDER_STATUS.FAILED });
      repo.seedOrder({
        customer_id,
        status: ORDER_STATUS.COMPLETED,
        assigned_staff_id: USERS.press.id,
        created_at: new Date('2024-03-01T00:00:00Z'),
        completed_at: new Date('2024-03-01T02:00:00Z'),
      });
      repo.seedOrder({
        customer_id,
        status: ORDER_STATUS.COMPLETED,
        assigned_staff_id: USERS.press.id,
        created_at: new Date('2024-03-01T00:00:00Z'),
        completed_at: new Date('2024-03-01T04:00:00Z'),
      });
      repo.seedOrder({
        customer_id,
        status: ORDER_STATUS.COMPLETED,
        assigned_staff_id: USERS.otherPress.id,
        created_at: new Date('2024-03-01T00:00:00Z'),
        completed_at: new Date('2024-03-01T01:00:00Z'),
      });

      const overview = await services.dashboard.adminOverview(ACTORS.admin, FIRST_PAGE);

      expect(overview.counts).toEqual({
        pending: 2,
        in_progress: 1,
        ready: 1,
        done: 4,
        draft: 1,
        failed: 1,
        total: 10,
      });
      expect(overview.orders.total).toBe(10);
      expect(overview.staff_performance).toEqual([
        {
          staff_id: USERS.press.id,
          staff_email: 'pat.press@example.test',
          staff_name: 'Pat Press',
          completed_orders: 2,
          avg_completion_seconds: 10800,
        },
        {
          staff_id: USERS.otherPress.id,
          staff_email: 'parker.press@example.test',
          staff_name: 'Parker Press',
          completed_orders: 1,
          avg_completion_seconds: 3600,
        },
      ]);
    });

    it('is admin only', async () => {
      const { services } = buildTestContext();

      await expect(services.dashboard.adminOverview(ACTORS.press, FIRST_PAGE)).rejects.toBeInstanceOf(ForbiddenError);
    });
  });

  describe('queueFor', () => {
    it('picks the queue matching the actor\'s role', async () => {
      const { services, ordersRepository: repo } = buildTestContext();
      const mine = repo.seedOrder({ customer_id: USERS.customer.id });
      const confirmed = repo.seedOrder({ customer_id: USERS.otherCustomer.id, status: ORDER_STATUS.CONFIRMED });
      const ready = repo.seedOrder({ customer_id: USERS.otherCustomer.id, status: ORDER_STATUS.READY });

      expect(ids((await services.dashboard.queueFor(ACTORS.customer, FIRST_PAGE)).rows)).toEqual([mine.id]);
      expect(ids((await services.dashboard.queueFor(ACTORS.press, FIRST_PAGE)).rows)).toEqual([confirmed.id, ready.id]);
      expect(ids((await services.dashboard.queueFor(ACTORS.delivery, FIRST_PAGE)).rows)).toEqual([ready.id]);
      expect(ids((await services.dashboard.queueFor(ACTORS.admin, FIRST_PAGE)).rows)).toEqual([
        ready.id,
        confirmed.id,
        mine.id,
      ]);
      expect(
        ids((await services.dashboard.queueFor(ACTORS.admin, { ...FIRST_PAGE, bucket: 'ready' })).rows)
      ).toEqual([ready.id]);
    });
  });
});
