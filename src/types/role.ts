export const ROLES = ["user", "admin"] as const;

export type Role = typeof ROLES[number];

export const isRole = (value: unknown): value is Role => {
  return typeof value === "string" && (ROLES as readonly string[]).includes(value);
};

export const ACCOUNT_STATUSES = ["ACTIVE", "SUSPENDED", "DEACTIVATED"] as const;

export type AccountStatus = typeof ACCOUNT_STATUSES[number];

export const isAccountStatus = (value: unknown): value is AccountStatus => {
  return (
    typeof value === "string" &&
    (ACCOUNT_STATUSES as readonly string[]).includes(value)
  );
};
