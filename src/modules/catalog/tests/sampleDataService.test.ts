import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { SampleDataService, SAMPLE_PRODUCTS } from '../services/sampleDataService';
import { ProductModel } from '../models/Product';
import { SaleModel } from '../models/Sale';
import { createTestDb, insertProducts, insertSales } from '../../../tests/testDb';

describe('SampleDataService', () => {
  let db: Database.Database;
  let productModel: ProductModel;
  let saleModel: SaleModel;
  let service: SampleDataService;

  beforeEach(() => {
    db = createTestDb();
    productModel = new ProductModel(db);
    saleModel = new SaleModel(db);
    service = new SampleDataService(db, productModel, saleModel);
  });

  afterEach(() => {
    db.close();
  });

  it('creates the five sample products and five sales', () => {
    expect(service.createSampleData()).toEqual({ products: 5, sales: 5 });
  });

  it('replaces existing rows instead of appending', () => {
    insertProducts(db, [[42, 'Stray', null, 1, 1]]);
    insertSales(db, [[42, 42, 7]]);

    service.createSampleData();
    const result = service.createSampleData();

    expect(result).toEqual({ products: 5, sales: 5 });
    const ids = db.prepare<[], { id: number }>('SELECT id FROM products ORDER BY id').all().map(row => row.id);
    expect(ids).toEqual(SAMPLE_PRODUCTS.map(product => product.id));
  });

  it('stores sale dates alongside quantities', () => {
    service.createSampleData();

    const sale = db
      .prepare<[number], { product_id: number; quantity: number; sale_date: string }>(
        'SELECT product_id, quantity, sale_date FROM sales WHERE id = ?'
      )
      .get(4);

    expect(sale).toEqual({ product_id: 1, quantity: 1, sale_date: '2025-11-18' });
  });

  it('rolls back when an insert fails', () => {
    insertProducts(db, [[42, 'Stray', null, 1, 1]]);
    db.exec('CREATE TRIGGER no_desks BEFORE INSERT ON products WHEN NEW.name = \'Desk\' BEGIN SELECT RAISE(ABORT, \'no desks\'); END');

    expect(() => service.createSampleData()).toThrow('no desks');
    expect(productModel.count()).toBe(1);
    expect(saleModel.count()).toBe(0);
  });
});

describe('ProductModel', () => {
  it('creates the products table once', () => {
    const db = createTestDb();
    const model = new ProductModel(db);

    model.initialize();
    model.create({ id: 7, name: 'Lamp', price: 12.5, category: 'Furniture', stock: 3 });

    expect(model.count()).toBe(1);
    expect(model.deleteAll()).toBe(1);
    db.close();
  });
});
