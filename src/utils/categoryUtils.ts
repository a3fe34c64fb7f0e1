export const CATEGORIES = [
  'salary',
  'rent',
  'groceries',
  'utilities',
  'dining',
  'transportation',
  'entertainment',
  'healthcare',
  'shopping',
  'other',
] as const;

export type Category = (typeof CATEGORIES)[number];

const KEYWORDS: Array<[Category, string[]]> = [
  ['salary', ['salary', 'payroll', 'paycheck', 'freelance', 'bonus']],
  ['rent', ['rent', 'landlord', 'lease']],
  ['groceries', ['grocery', 'groceries', 'supermarket', 'market', 'bakery']],
  ['utilities', ['electric', 'water bill', 'internet', 'gas bill', 'phone bill']],
  ['dining', ['restaurant', 'cafe', 'coffee', 'dinner', 'lunch']],
  ['transportation', ['uber', 'taxi', 'bus', 'fuel', 'metro', 'train']],
  ['entertainment', ['cinema', 'movie', 'concert', 'netflix', 'spotify']],
  ['healthcare', ['pharmacy', 'doctor', 'hospital', 'dentist', 'medicine']],
  ['shopping', ['amazon', 'clothes', 'store', 'mall']],
];

export const getCategoryFromDescription = (description: string): Category => {
  const desc = description.toLowerCase();

  for (const [category, words] of KEYWORDS) {
    if (words.some((word) => desc.includes(word))) {
      return category;
    }
  }

  return 'other';
};

export const formatCategoryLabel = (category: string): string =>
  category.length === 0 ? category : category[0].toUpperCase() + category.slice(1);
