export type MenuCategory = 'entree' | 'side' | 'accompaniment';

export interface MenuItem {
  readonly name: string;
  readonly description: string;
  readonly price: number;
  readonly category: MenuCategory;
}

// Keyed by the item key passed to the slot setters (e.g. 'pasta')
export type MenuLookup = ReadonlyMap<string, MenuItem>;

export const CATEGORY_LABELS: Record<MenuCategory, string> = {
  'entree': 'Entree',
  'side': 'Side Dish',
  'accompaniment': 'Accompaniment',
};
