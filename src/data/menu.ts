import type { MenuCategory, MenuItem, MenuLookup } from '@/types/menu';

export const menuItems: ReadonlyArray<{ key: string; item: MenuItem }> = [
  // Entrees
  { key: 'cauliflower', item: { name: 'Cauliflower', category: 'entree', price: 7.0, description: 'Whole cauliflower, brined, roasted, and deep fried' } },
  { key: 'chili', item: { name: 'Three Bean Chili', category: 'entree', price: 4.0, description: 'Black beans, red beans, kidney beans, slow cooked, topped with onion' } },
  { key: 'pasta', item: { name: 'Mushroom Pasta', category: 'entree', price: 5.5, description: 'Penne pasta, mushrooms, basil, with plum tomatoes cooked in garlic and olive oil' } },
  { key: 'skillet', item: { name: 'Spicy Black Bean Skillet', category: 'entree', price: 5.5, description: 'Seasonal vegetables, black beans, house spice blend, served with avocado and quick pickled onions' } },

  // Sides
  { key: 'salad', item: { name: 'Summer Salad', category: 'side', price: 2.5, description: 'Heirloom tomatoes, butter lettuce, peaches, avocado, balsamic dressing' } },
  { key: 'soup', item: { name: 'Butternut Squash Soup', category: 'side', price: 3.0, description: 'Roasted butternut squash, roasted peppers, chili oil' } },
  { key: 'potatoes', item: { name: 'Spicy Potatoes', category: 'side', price: 2.0, description: 'Marble potatoes, roasted, and fried in house spice blend' } },
  { key: 'rice', item: { name: 'Coconut Rice', category: 'side', price: 1.5, description: 'Rice, coconut milk, lime, and sugar' } },

  // Accompaniments
  { key: 'bread', item: { name: 'Lunch Roll', category: 'accompaniment', price: 0.5, description: 'Fresh baked roll made in house' } },
  { key: 'berries', item: { name: 'Mixed Berries', category: 'accompaniment', price: 1.0, description: 'Strawberries, blueberries, raspberries, and huckleberries' } },
  { key: 'pickles', item: { name: 'Pickled Veggies', category: 'accompaniment', price: 0.5, description: 'Pickled cucumbers and carrots, made in house' } },
];

export const menuLookup: MenuLookup = new Map(
  menuItems.map(({ key, item }): [string, MenuItem] => [key, item])
);

export const getMenuItemsByCategory = (category: MenuCategory): MenuItem[] =>
  menuItems.filter(({ item }) => item.category === category).map(({ item }) => item);
