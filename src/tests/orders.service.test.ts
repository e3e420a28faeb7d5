import { describe, expect, it } from '@jest/globals';
import { ORDER_STATUS } from '../constants';
import {
  BadRequestError,
  CatalogLookupError,
  ForbiddenError,
  NotFoundError,
} from '../utils/errors';
import { ACTORS, USERS, buildTestContext } from './helpers/fixtures';

const DRY_CLEAN = { service_id: 2, quantity: 1 };

describe('OrdersService', () => {
  describe('createOrder', () => {
    it('prices the items and numbers the order by day', async () => {
      const { services } = buildTestContext();

      const detail = await services.orders.createOrder(ACTORS.customer, {
        items: [{ service_id: 1, variant_id: 10, option_ids: [100, 101], quantity: 2 }, DRY_CLEAN],
      });

      expect(detail.order).toMatchObject({
        order_number: '240305-00001',
        customer_id: USERS.customer.id,
        status: ORDER_STATUS.DRAFT,
        delivery_type: 'pickup',
        subtotal: 94.5,
        tax_amount: 9.45,
        shipping_cost: 0,
        discount_amount: 0,
        total_amount: 103.95,
      });
      expect(detail.items.map((item) => [item.name, item.unit_price, item.options_total, item.total_price])).toEqual([
        ['Wash & Fold - Large', 35, 4.5, 74.5],
        ['Dry Clean', 20, 0, 20],
      ]);
      expect(detail.status_updates).toEqual([]);
      expect(detail.allowed_transitions).toEqual([ORDER_STATUS.CONFIRMED, ORDER_STATUS.CANCELLED]);
    });

    it('continues the day\'s sequence', async () => {
      const { services } = buildTestContext();

      await services.orders.createOrder(ACTORS.customer, {});
      const second = await services.orders.createOrder(ACTORS.otherCustomer, { status: ORDER_STATUS.PENDING });

      expect(second.order.order_number).toBe('240305-00002');
      expect(second.order.status).toBe(ORDER_STATUS.PENDING);
    });

    it('stores each option once', async () => {
      const { services } = buildTestContext();

      const detail = await services.orders.createOrder(ACTORS.customer, {
        items: [{ service_id: 1, option_ids: [100, 100], quantity: 1 }],
      });

      expect(detail.items[0].option_ids).toEqual([100]);
      expect(detail.items[0].total_price).toBe(33);
    });

    it('is only open to customers', async () => {
      const { services } = buildTestContext();

      await expect(services.orders.createOrder(ACTORS.press, {})).rejects.toBeInstanceOf(ForbiddenError);
    });

    it('requires an address for delivery orders', async () => {
      const { services } = buildTestContext();

      await expect(
        services.orders.createOrder(ACTORS.customer, { delivery_type: 'delivery' })
      ).rejects.toBeInstanceOf(BadRequestError);
    });

    it('requires delivery after pickup', async () => {
      const { services } = buildTestContext();

      await expect(
        services.orders.createOrder(ACTORS.customer, {
          preferred_pickup_date: '2024-03-10',
          preferred_delivery_date: '2024-03-10',
        })
      ).rejects.toMatchObject({ message: 'Delivery date must be after pickup date' });
    });

    it('does not let customers discount items', async () => {
      const { services } = buildTestContext();

      await expect(
        services.orders.createOrder(ACTORS.customer, { items: [{ ...DRY_CLEAN, discount_amount: 5 }] })
      ).rejects.toBeInstanceOf(ForbiddenError);
    });

    it('rejects inactive catalog entries', async () => {
      const { services, ordersRepository } = buildTestContext();

      await expect(
        services.orders.createOrder(ACTORS.customer, { items: [{ service_id: 3, quantity: 1 }] })
      ).rejects.toBeInstanceOf(CatalogLookupError);
      expect(ordersRepository.transactionCount).toBe(0);
    });
  });

  describe('viewing', () => {
    it('hides an order from other customers but not from staff', async () => {
      const { services } = buildTestContext();
      const { order } = await services.orders.createOrder(ACTORS.customer, { items: [DRY_CLEAN] });

      await expect(services.orders.getOrderDetail(ACTORS.otherCustomer, order.id)).rejects.toBeInstanceOf(ForbiddenError);
      const detail = await services.orders.getOrderDetail(ACTORS.press, order.id);
      expect(detail.items).toHaveLength(1);
      expect(detail.allowed_transitions).toEqual([]);
    });

    it('fails for an unknown order', async () => {
      const { services } = buildTestContext();

      await expect(services.orders.getOrderDetail(ACTORS.admin, 77)).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('editing', () => {
    it('adds the delivery fee when switching to delivery', async () => {
      const { services } = buildTestContext();
      const { order } = await services.orders.createOrder(ACTORS.customer, { items: [DRY_CLEAN] });

      const updated = await services.orders.updateDeliveryDetails(ACTORS.customer, order.id, {
        delivery_type: 'delivery',
        delivery_address: '9 Elm Rd',
      });

      expect(updated).toMatchObject({
        delivery_type: 'delivery',
        delivery_address: '9 Elm Rd',
        subtotal: 20,
        tax_amount: 2,
        shipping_cost: 5,
        total_amount: 27,
      });
    });

    it('recomputes totals as items come and go', async () => {
      const { services } = buildTestContext();
      const created = await services.orders.createOrder(ACTORS.customer, { items: [DRY_CLEAN] });

      const added = await services.orders.addItem(ACTORS.customer, created.order.id, {
        service_id: 1,
        option_ids: [100],
        quantity: 1,
      });
      expect(added.order).toMatchObject({ subtotal: 53, tax_amount: 5.3, total_amount: 58.3 });

      const removed = await services.orders.removeItem(ACTORS.customer, created.order.id, created.items[0].id);
      expect(removed.items.map((item) => item.name)).toEqual(['Wash & Fold']);
      expect(removed.order).toMatchObject({ subtotal: 33, tax_amount: 3.3, total_amount: 36.3 });
    });

    it('reports a missing item', async () => {
      const { services } = buildTestContext();
      const { order } = await services.orders.createOrder(ACTORS.customer, {});

      await expect(services.orders.removeItem(ACTORS.customer, order.id, 999)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('lets admins discount an item', async () => {
      const { services } = buildTestContext();
      const { order } = await services.orders.createOrder(ACTORS.customer, {});

      const detail = await services.orders.addItem(ACTORS.admin, order.id, { ...DRY_CLEAN, discount_amount: 5 });

      expect(detail.items[0].total_price).toBe(15);
      expect(detail.order.total_amount).toBe(16.5);
    });

    it('locks the order once pickup is scheduled', async () => {
      const { services, ordersRepository } = buildTestContext();
      const seeded = ordersRepository.seedOrder({
        customer_id: USERS.customer.id,
        status: ORDER_STATUS.SCHEDULED_FOR_PICKUP,
      });

      await expect(
        services.orders.updateDeliveryDetails(ACTORS.customer, seeded.id, { pickup_address: '2 Oak Ave' })
      ).rejects.toMatchObject({ code: 'ORDER_LOCKED', message: 'Cannot edit an order in status scheduled_for_pickup' });
      await expect(services.orders.addItem(ACTORS.customer, seeded.id, DRY_CLEAN)).rejects.toMatchObject({
        code: 'ORDER_LOCKED',
      });
    });

    it('keeps other customers out', async () => {
      const { services } = buildTestContext();
      const { order } = await services.orders.createOrder(ACTORS.customer, {});

      await expect(
        services.orders.updateDeliveryDetails(ACTORS.otherCustomer, order.id, { pickup_address: '2 Oak Ave' })
      ).rejects.toBeInstanceOf(ForbiddenError);
      await expect(services.orders.addItem(ACTORS.press, order.id, DRY_CLEAN)).rejects.toBeInstanceOf(ForbiddenError);
    });
  });

  describe('deleteDraft', () => {
    it('removes a draft', async () => {
      const { services, ordersRepository } = buildTestContext();
      const { order } = await services.orders.createOrder(ACTORS.customer, { items: [DRY_CLEAN] });

      await services.orders.deleteDraft(ACTORS.customer, order.id);

      expect(await ordersRepository.findById(order.id)).toBeNull();
      expect(await ordersRepository.listItems(order.id)).toEqual([]);
    });

    it('refuses anything past draft', async () => {
      const { services } = buildTestContext();
      const { order } = await services.orders.createOrder(ACTORS.customer, { status: ORDER_STATUS.PENDING });

      await expect(services.orders.deleteDraft(ACTORS.customer, order.id)).rejects.toMatchObject({
        code: 'ORDER_LOCKED',
        message: 'Cannot delete an order in status pending',
      });
    });
  });

  describe('admin operations', () => {
    it('sets the payment status', async () => {
      const { services } = buildTestContext();
      const { order } = await services.orders.createOrder(ACTORS.customer, {});

      await expect(
        services.orders.setPaymentStatus(ACTORS.customer, order.id, 'paid')
      ).rejects.toBeInstanceOf(ForbiddenError);
      const updated = await services.orders.setPaymentStatus(ACTORS.admin, order.id, 'paid');
      expect(updated.payment_status).toBe('paid');
    });

    it('applies an order discount', async () => {
      const { services, ordersRepository } = buildTestContext();
      const { order } = await services.orders.createOrder(ACTORS.customer, { items: [DRY_CLEAN] });

      const updated = await services.orders.setDiscount(ACTORS.admin, order.id, 10);
      expect(updated).toMatchObject({ subtotal: 20, tax_amount: 2, discount_amount: 10, total_amount: 12 });

      const done = ordersRepository.seedOrder({ customer_id: USERS.customer.id, status: ORDER_STATUS.CANCELLED });
      await expect(services.orders.setDiscount(ACTORS.admin, done.id, 5)).rejects.toMatchObject({
        code: 'ORDER_LOCKED',
      });
    });

    describe('assign', () => {
      it('assigns press staff once the order is confirmed', async () => {
        const { services, ordersRepository } = buildTestContext();
        const draft = ordersRepository.seedOrder({ customer_id: USERS.customer.id });
        const confirmed = ordersRepository.seedOrder({ customer_id: USERS.customer.id, status: ORDER_STATUS.CONFIRMED });

        await expect(
          services.orders.assign(ACTORS.admin, draft.id, { assigned_staff_id: USERS.press.id })
        ).rejects.toBeInstanceOf(BadRequestError);

        const updated = await services.orders.assign(ACTORS.admin, confirmed.id, { assigned_staff_id: USERS.press.id });
        expect(updated.assigned_staff_id).toBe(USERS.press.id);
      });

      it('assigns a delivery person once pickup is scheduled', async () => {
        const { services, ordersRepository } = buildTestContext();
        const confirmed = ordersRepository.seedOrder({ customer_id: USERS.customer.id, status: ORDER_STATUS.CONFIRMED });
        const ready = ordersRepository.seedOrder({ customer_id: USERS.customer.id, status: ORDER_STATUS.READY });

        await expect(
          services.orders.assign(ACTORS.admin, confirmed.id, { delivery_person_id: USERS.delivery.id })
        ).rejects.toBeInstanceOf(BadRequestError);

        const updated = await services.orders.assign(ACTORS.admin, ready.id, { delivery_person_id: USERS.delivery.id });
        expect(updated.delivery_person_id).toBe(USERS.delivery.id);
      });

      it('only assigns active users of the matching role', async () => {
        const { services, ordersRepository } = buildTestContext();
        const order = ordersRepository.seedOrder({ customer_id: USERS.customer.id, status: ORDER_STATUS.PROCESSING });

        await expect(
          services.orders.assign(ACTORS.admin, order.id, { assigned_staff_id: USERS.inactivePress.id })
        ).rejects.toBeInstanceOf(BadRequestError);
        await expect(
          services.orders.assign(ACTORS.admin, order.id, { assigned_staff_id: USERS.delivery.id })
        ).rejects.toBeInstanceOf(BadRequestError);
        await expect(
          services.orders.assign(ACTORS.admin, order.id, { delivery_person_id: USERS.press.id })
        ).rejects.toBeInstanceOf(BadRequestError);
      });

      it('unassigns with null', async () => {
        const { services, ordersRepository } = buildTestContext();
        const order = ordersRepository.seedOrder({
          customer_id: USERS.customer.id,
          status: ORDER_STATUS.PROCESSING,
          assigned_staff_id: USERS.press.id,
          delivery_person_id: USERS.delivery.id,
        });

        const updated = await services.orders.assign(ACTORS.admin, order.id, { assigned_staff_id: null });

        expect(updated.assigned_staff_id).toBeNull();
        expect(updated.delivery_person_id).toBe(USERS.delivery.id);
      });

      it('is admin only', async () => {
        const { services, ordersRepository } = buildTestContext();
        const order = ordersRepository.seedOrder({ customer_id: USERS.customer.id, status: ORDER_STATUS.CONFIRMED });

        await expect(
          services.orders.assign(ACTORS.press, order.id, { assigned_staff_id: USERS.press.id })
        ).rejects.toBeInstanceOf(ForbiddenError);
      });
    });

    describe('reprice', () => {
      it('picks up current catalog prices', async () => {
        const { services, catalogRepository } = buildTestContext();
        const { order } = await services.orders.createOrder(ACTORS.customer, { items: [DRY_CLEAN] });
        catalogRepository.setBasePrice(2, 25);

        const detail = await services.orders.reprice(ACTORS.admin, order.id);

        expect(detail.items[0]).toMatchObject({ unit_price: 25, total_price: 25 });
        expect(detail.order).toMatchObject({ subtotal: 25, tax_amount: 2.5, total_amount: 27.5 });
      });

      it('refuses orders that are already being worked', async () => {
        const { services, ordersRepository } = buildTestContext();
        const order = ordersRepository.seedOrder({ customer_id: USERS.customer.id, status: ORDER_STATUS.PROCESSING });

        await expect(services.orders.reprice(ACTORS.admin, order.id)).rejects.toMatchObject({
          code: 'ORDER_LOCKED',
          message: 'Cannot reprice an order in status processing',
        });
      });
    });
  });
});
