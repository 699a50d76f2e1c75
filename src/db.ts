import Database from 'better-sqlite3';
import { ProductModel } from './modules/catalog/models/Product';
import { SaleModel } from './modules/catalog/models/Sale';

/**
 * Opens the catalog database and makes sure both report tables exist.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(filename: string): Database.Database {
  const db: Database.Database = new Database(filename);

  // Enable foreign keys
  db.pragma('foreign_keys = ON');

  // products first: sales references it
  new ProductModel(db).initialize();
  new SaleModel(db).initialize();

  return db;
}
