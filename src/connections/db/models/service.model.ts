// Service catalog models - read-only input to pricing

export interface Service {
  id: number;
  name: string;
  base_price: number; // DECIMAL(10, 2)
  is_active: boolean;
}

export interface ServiceVariant {
  id: number;
  service_id: number;
  name: string;
  price_adjustment: number; // DECIMAL(10, 2), may be negative
  is_active: boolean;
}

export interface ServiceOption {
  id: number;
  service_id: number;
  name: string;
  price_adjustment: number; // DECIMAL(10, 2)
  is_active: boolean;
}
