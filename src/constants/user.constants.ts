/**
 * User Role Constants
 */
export const USER_ROLE = {
  CUSTOMER: 'customer', // default
  PRESS: 'press',
  DELIVERY: 'delivery',
  ADMIN: 'admin',
} as const;

export type UserRole = typeof USER_ROLE[keyof typeof USER_ROLE];

export const USER_ROLES: readonly UserRole[] = Object.values(USER_ROLE);

export const isUserRole = (value: string): value is UserRole =>
  USER_ROLES.some((role) => role === value);

/**
 * User Status Constants
 */
export const USER_STATUS = {
  ACTIVE: 'active', // default
  BANNED: 'banned',
  DELETED: 'deleted',
} as const;

export type UserStatus = typeof USER_STATUS[keyof typeof USER_STATUS];
