import { describe, expect, it } from '@jest/globals';
import { ORDER_STATUS, ORDER_STATUSES, ORDER_TRANSITIONS, TERMINAL_ORDER_STATUSES } from '../constants';
import {
  allowedNextStatuses,
  canTransition,
  hasReached,
  isTerminalStatus,
  planTransition,
} from '../modules/orders/order-status-machine';
import { ACTORS, buildOrder } from './helpers/fixtures';

const NOW = new Date('2024-03-06T08:00:00Z');

describe('order status machine', () => {
  it('allows exactly the listed transitions', () => {
    for (const from of ORDER_STATUSES) {
      for (const to of ORDER_STATUSES) {
        expect(canTransition(from, to)).toBe(ORDER_TRANSITIONS[from].includes(to));
      }
    }
  });

  it('lets every non-terminal status be cancelled', () => {
    for (const status of ORDER_STATUSES.filter((candidate) => !isTerminalStatus(candidate))) {
      expect(canTransition(status, ORDER_STATUS.CANCELLED)).toBe(true);
    }
  });

  it('has no way out of a terminal status', () => {
    for (const status of TERMINAL_ORDER_STATUSES) {
      expect(allowedNextStatuses(status)).toEqual([]);
    }
  });

  it('offers draft orders confirmation, submission and cancellation', () => {
    expect(allowedNextStatuses(ORDER_STATUS.DRAFT)).toEqual([
      ORDER_STATUS.CONFIRMED,
      ORDER_STATUS.PENDING,
      ORDER_STATUS.CANCELLED,
    ]);
  });

  it('hasReached follows the workflow order', () => {
    expect(hasReached(ORDER_STATUS.CONFIRMED, ORDER_STATUS.CONFIRMED)).toBe(true);
    expect(hasReached(ORDER_STATUS.PROCESSING, ORDER_STATUS.SCHEDULED_FOR_PICKUP)).toBe(true);
    expect(hasReached(ORDER_STATUS.PENDING, ORDER_STATUS.CONFIRMED)).toBe(false);
  });

  describe('planTransition', () => {
    it('sets the status and its lifecycle timestamp', () => {
      const order = buildOrder({ status: ORDER_STATUS.PENDING });
      expect(planTransition(order, ORDER_STATUS.CONFIRMED, ACTORS.customer, '', NOW)).toEqual({
        status: ORDER_STATUS.CONFIRMED,
        confirmed_at: NOW,
      });
    });

    it('keeps a lifecycle timestamp that is already set', () => {
      const earlier = new Date('2024-03-01T00:00:00Z');
      const order = buildOrder({ status: ORDER_STATUS.PENDING, confirmed_at: earlier });
      const changes = planTransition(order, ORDER_STATUS.CONFIRMED, ACTORS.admin, '', NOW);
      expect(changes).toEqual({ status: ORDER_STATUS.CONFIRMED });
    });

    it('sets no timestamp for pending', () => {
      const order = buildOrder();
      expect(planTransition(order, ORDER_STATUS.PENDING, ACTORS.customer, '', NOW)).toEqual({
        status: ORDER_STATUS.PENDING,
      });
    });

    it('assigns press staff who schedule an unassigned order', () => {
      const order = buildOrder({ status: ORDER_STATUS.CONFIRMED });
      const changes = planTransition(order, ORDER_STATUS.SCHEDULED_FOR_PICKUP, ACTORS.press, '', NOW);
      expect(changes.assigned_staff_id).toBe(ACTORS.press.id);
      expect(changes.scheduled_at).toBe(NOW);
    });

    it('assigns press staff who process or finish an unassigned order', () => {
      const pickedUp = buildOrder({ status: ORDER_STATUS.PICKED_UP });
      expect(planTransition(pickedUp, ORDER_STATUS.PROCESSING, ACTORS.press, '', NOW)).toEqual({
        status: ORDER_STATUS.PROCESSING,
        processing_started_at: NOW,
        assigned_staff_id: ACTORS.press.id,
      });

      const processing = buildOrder({ status: ORDER_STATUS.PROCESSING, processing_started_at: NOW });
      expect(planTransition(processing, ORDER_STATUS.READY, ACTORS.otherPress, '', NOW).assigned_staff_id).toBe(
        ACTORS.otherPress.id
      );
    });

    it('does not replace existing press staff or assign admins', () => {
      const assigned = buildOrder({ status: ORDER_STATUS.CONFIRMED, assigned_staff_id: ACTORS.otherPress.id });
      expect(planTransition(assigned, ORDER_STATUS.SCHEDULED_FOR_PICKUP, ACTORS.press, '', NOW).assigned_staff_id).toBeUndefined();

      const unassigned = buildOrder({ status: ORDER_STATUS.CONFIRMED });
      expect(planTransition(unassigned, ORDER_STATUS.SCHEDULED_FOR_PICKUP, ACTORS.admin, '', NOW).assigned_staff_id).toBeUndefined();
    });

    it('assigns the delivery person who starts a pickup', () => {
      const order = buildOrder({ status: ORDER_STATUS.SCHEDULED_FOR_PICKUP });
      const changes = planTransition(order, ORDER_STATUS.OUT_FOR_PICKUP, ACTORS.delivery, '', NOW);
      expect(changes).toEqual({
        status: ORDER_STATUS.OUT_FOR_PICKUP,
        out_for_pickup_at: NOW,
        delivery_person_id: ACTORS.delivery.id,
      });
    });

    it('records the notes as the cancellation reason', () => {
      const order = buildOrder({ status: ORDER_STATUS.PENDING });
      expect(planTransition(order, ORDER_STATUS.CANCELLED, ACTORS.customer, '  changed my mind ', NOW)).toEqual({
        status: ORDER_STATUS.CANCELLED,
        cancelled_at: NOW,
        cancellation_reason: 'changed my mind',
      });
    });

    it('leaves the cancellation reason unset without notes', () => {
      const order = buildOrder({ status: ORDER_STATUS.PENDING });
      expect(planTransition(order, ORDER_STATUS.CANCELLED, ACTORS.customer, '   ', NOW).cancellation_reason).toBeUndefined();
    });
  });
});
