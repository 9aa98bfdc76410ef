/**
 * Listing categories. Ids are what gets stored; names are what users see.
 */

export interface Category {
  id: string;
  name: string;
  emoji: string;
}

export const CATEGORIES: readonly Category[] = [
  { id: 'electronics', name: 'Electronics', emoji: '📱' },
  { id: 'clothing', name: 'Clothing & Fashion', emoji: '👕' },
  { id: 'home', name: 'Home & Garden', emoji: '🏠' },
  { id: 'vehicles', name: 'Vehicles', emoji: '🚗' },
  { id: 'services', name: 'Services', emoji: '🔧' },
  { id: 'jobs', name: 'Jobs', emoji: '💼' },
  { id: 'pets', name: 'Pets', emoji: '🐾' },
  { id: 'sports', name: 'Sports & Hobbies', emoji: '⚽' },
  { id: 'books', name: 'Books & Learning', emoji: '📚' },
  { id: 'other', name: 'Other', emoji: '📦' },
];

export function findCategory(id: string): Category | undefined {
  return CATEGORIES.find((category) => category.id === id);
}

export function categoryLabel(id: string): string {
  const category = findCategory(id);
  return category ? `${category.emoji} ${category.name}` : id;
}
