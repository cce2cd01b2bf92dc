export const CATEGORY_OPTIONS = [
  'Fruits',
  'Vegetables',
  'Snacks',
  'Beverages',
  'Dairy',
  'Meat',
  'Bakery',
  'Frozen Foods',
  'Other',
] as const;

export type Category = (typeof CATEGORY_OPTIONS)[number];

export function isCategory(value: unknown): value is Category {
  return (
    typeof value === 'string' &&
    CATEGORY_OPTIONS.some((category) => category === value)
  );
}

export const DEFAULT_LOW_STOCK_THRESHOLD = 15;
