import { MigrationInfo } from './types';

import * as migration001 from './20251120_000001_create_users_table';
import * as migration002 from './20251120_000002_create_services_tables';
import * as migration003 from './20251120_000003_create_order_number_counters_table';
import * as migration004 from './20251120_000004_create_orders_table';
import * as migration005 from './20251120_000005_create_order_items_table';
import * as migration006 from './20251120_000006_create_order_status_updates_table';

export const migrations: MigrationInfo[] = [
  { name: '20251120_000001_create_users_table', migration: migration001.migration },
  { name: '20251120_000002_create_services_tables', migration: migration002.migration },
  { name: '20251120_000003_create_order_number_counters_table', migration: migration003.migration },
  { name: '20251120_000004_create_orders_table', migration: migration004.migration },
  { name: '20251120_000005_create_order_items_table', migration: migration005.migration },
  { name: '20251120_000006_create_order_status_updates_table', migration: migration006.migration },
];
