import { DELIVERY_TYPE, DeliveryType } from '../../constants';
import { OrderConfig, orderConfig } from '../../connections/config/app.config';
import { OrderItem, OrderTotals, Service, ServiceOption, ServiceVariant } from '../../connections/db/models';

export type PricingConfig = Pick<OrderConfig, 'taxRate' | 'deliveryFee'>;

export const roundMoney = (value: number): number =>
  Math.round((value + Number.EPSILON) * 100) / 100;

export interface ItemPricingInput {
  unit_price: number;
  quantity: number;
  options_total: number;
  discount_amount: number;
}

/**
 * max(0, unit_price * quantity + options_total - discount_amount)
 */
export const calculateItemTotal = (item: ItemPricingInput): number =>
  roundMoney(Math.max(0, item.unit_price * item.quantity + item.options_total - item.discount_amount));

export interface OrderTotalsInput {
  items: ReadonlyArray<Pick<OrderItem, 'total_price'>>;
  delivery_type: DeliveryType;
  discount_amount: number;
}

export const calculateOrderTotals = (
  input: OrderTotalsInput,
  config: PricingConfig = orderConfig
): OrderTotals => {
  const subtotal = roundMoney(input.items.reduce((sum, item) => sum + item.total_price, 0));
  const taxAmount = roundMoney(subtotal * config.taxRate);
  const shippingCost = input.delivery_type === DELIVERY_TYPE.DELIVERY ? roundMoney(config.deliveryFee) : 0;
  const discountAmount = roundMoney(Math.max(0, input.discount_amount));

  return {
    subtotal,
    tax_amount: taxAmount,
    shipping_cost: shippingCost,
    discount_amount: discountAmount,
    total_amount: roundMoney(Math.max(0, subtotal + taxAmount + shippingCost - discountAmount)),
  };
};

/**
 * True when the stored totals no longer match what the items and charges add up to
 */
export const totalsDiffer = (stored: OrderTotals, computed: OrderTotals): boolean =>
  stored.subtotal !== computed.subtotal ||
  stored.tax_amount !== computed.tax_amount ||
  stored.shipping_cost !== computed.shipping_cost ||
  stored.discount_amount !== computed.discount_amount ||
  stored.total_amount !== computed.total_amount;

export interface CatalogPrice {
  name: string;
  unit_price: number;
  options_total: number;
}

/**
 * Snapshot price of a catalog selection: base price plus variant adjustment, options summed separately
 */
export const priceCatalogSelection = (
  service: Service,
  variant: ServiceVariant | null,
  options: readonly ServiceOption[]
): CatalogPrice => ({
  name: variant ? `${service.name} - ${variant.name}` : service.name,
  unit_price: roundMoney(Math.max(0, service.base_price + (variant?.price_adjustment ?? 0))),
  options_total: roundMoney(options.reduce((sum, option) => sum + option.price_adjustment, 0)),
});
