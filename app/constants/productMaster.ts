export const PRODUCT_MASTER_CONSTANTS = {
  DEFAULT_CURRENCY_SYMBOL: "₱",
  UNASSIGNED_PRODUCT_LINE: "Unassigned",
  NOT_AVAILABLE: "N/A",
  ACTIVE_STATUS: "active",
  DISCONTINUED_STATUS: "discontinued",
} as const;

export const STATUS_OPTIONS = ["Active", "Discontinued", "Pending"] as const;

export const YES_NO_OPTIONS = ["Yes", "No"] as const;

/**
 * Fields entered through a fixed choice list, with their preselected value
 */
export const CHOICE_FIELD_DEFAULTS = {
  Status: STATUS_OPTIONS[0],
  "Expiry Item": YES_NO_OPTIONS[1],
  "Selling Ban": YES_NO_OPTIONS[1],
  "Tester product": YES_NO_OPTIONS[1],
} as const;

export const FILE_CONFIG = {
  DEFAULT_FILENAME: "product_master_data.csv",
  DELIMITER: ",",
  NEWLINE: "\r\n",
  ENCODING: "utf-8",
} as const;

export const DASHBOARD_CARDS = [
  { label: "Total Products", metric: "Total Products", color: "blue" },
  { label: "Active Products", metric: "Active Products", color: "green" },
  { label: "Discontinued", metric: "Discontinued", color: "red" },
  { label: "Average SRP", metric: "Avg SRP", color: "purple" },
  { label: "Top Product Line", metric: "Top Product Line", color: "orange" },
] as const;
