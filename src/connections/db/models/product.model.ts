// Product Model - collection "product"

export interface Product {
  id: string; // ObjectId hex
  name: string;
  description: string | null;
  price: number; // >= 0
  category: string; // e.g. Weapons, Tools, Ranks
  image: string | null; // public image path
}

export interface CreateProductInput {
  name: string;
  description?: string | null;
  price: number;
  category: string;
  image?: string | null;
}
