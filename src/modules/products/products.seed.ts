import { CreateProductInput } from '../../connections/db/models';

// Catalog inserted when the product collection is empty
export const DEFAULT_PRODUCTS: readonly CreateProductInput[] = [
  {
    name: 'Diamond Sword',
    description: 'Sharp V ready! Deal massive damage.',
    price: 12.99,
    category: 'Weapons',
    image: '/items/diamond_sword.png',
  },
  {
    name: 'Enchanted Pickaxe',
    description: 'Efficiency V, Unbreaking III.',
    price: 10.49,
    category: 'Tools',
    image: '/items/enchanted_pickaxe.png',
  },
  {
    name: 'Netherite Armor Set',
    description: 'Full protection for endgame raiding.',
    price: 39.99,
    category: 'Armor',
    image: '/items/netherite_armor.png',
  },
  {
    name: 'VIP Rank (30 Days)',
    description: 'Perks: /fly, kits, queue skip.',
    price: 14.99,
    category: 'Ranks',
    image: '/items/vip_rank.png',
  },
];
