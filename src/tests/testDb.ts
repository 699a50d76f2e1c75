import path from 'path';
import Database from 'better-sqlite3';
import { openDatabase } from '../db';

export const SQL_DIR = path.resolve(__dirname, '../../sql');

export function createTestDb(): Database.Database {
  return openDatabase(':memory:');
}

type ProductTuple = [id: number, name: string, category: string | null, price: number | null, stock: number | null];

export function insertProducts(db: Database.Database, products: ProductTuple[]): void {
  const stmt = db.prepare<[number, string, string | null, number | null, number | null]>(
    'INSERT INTO products (id, name, category, price, stock) VALUES (?, ?, ?, ?, ?)'
  );
  products.forEach(product => stmt.run(...product));
}

export function insertSales(db: Database.Database, sales: [id: number, productId: number, quantity: number][]): void {
  const stmt = db.prepare<[number, number, number]>('INSERT INTO sales (id, product_id, quantity) VALUES (?, ?, ?)');
  sales.forEach(sale => stmt.run(...sale));
}
