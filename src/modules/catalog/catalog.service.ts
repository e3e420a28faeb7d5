import { ServiceVariant } from '../../connections/db/models';
import { CatalogLookupError } from '../../utils/errors';
import { CatalogPrice, priceCatalogSelection } from '../orders/pricing.service';
import { CatalogRepository } from './catalog.repository';

export interface CatalogSelection {
  serviceId: number;
  variantId?: number | null;
  optionIds: readonly number[];
}

export interface PriceOptions {
  // Repricing existing items still resolves entries that were deactivated after they were ordered
  includeInactive?: boolean;
}

export class CatalogService {
  constructor(private readonly catalog: CatalogRepository) {}

  /**
   * Current name and prices for a selection. Fails when any part is unknown, inactive or belongs to another service.
   */
  async price(selection: CatalogSelection, options: PriceOptions = {}): Promise<CatalogPrice> {
    const usable = (entry: { is_active: boolean }) => options.includeInactive === true || entry.is_active;

    const service = await this.catalog.findService(selection.serviceId);
    if (!service || !usable(service)) {
      throw new CatalogLookupError(`Service ${selection.serviceId} is not available`, {
        serviceId: selection.serviceId,
      });
    }

    let variant: ServiceVariant | null = null;
    if (selection.variantId !== undefined && selection.variantId !== null) {
      variant = await this.catalog.findVariant(selection.variantId);
      if (!variant || variant.service_id !== service.id || !usable(variant)) {
        throw new CatalogLookupError(`Variant ${selection.variantId} is not available for service ${service.id}`, {
          serviceId: service.id,
          variantId: selection.variantId,
        });
      }
    }

    const optionIds = [...new Set(selection.optionIds)];
    const found = await this.catalog.findOptions(optionIds);
    const missing = optionIds.filter(
      (id) => !found.some((option) => option.id === id && option.service_id === service.id && usable(option))
    );
    if (missing.length > 0) {
      throw new CatalogLookupError(`Options ${missing.join(', ')} are not available for service ${service.id}`, {
        serviceId: service.id,
        optionIds: missing,
      });
    }

    return priceCatalogSelection(
      service,
      variant,
      found.filter((option) => optionIds.includes(option.id))
    );
  }
}
