// User Model - Based on migration 20251120_000001_create_users_table

import { UserRole, UserStatus } from '../../../constants';

export interface User {
  id: string; // UUID
  email: string;
  full_name: string | null;
  role: UserRole;
  is_superuser: boolean;
  status: UserStatus;
  created_at: Date;
  updated_at: Date;
}
