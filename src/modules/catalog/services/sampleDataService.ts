import Database from 'better-sqlite3';
import { Product, ProductModel } from '../models/Product';
import { Sale, SaleModel } from '../models/Sale';

export const SAMPLE_PRODUCTS: readonly Product[] = [
    { id: 1, name: 'Laptop', price: 999.99, category: 'Electronics', stock: 15 },
    { id: 2, name: 'Mouse', price: 29.99, category: 'Electronics', stock: 50 },
    { id: 3, name: 'Keyboard', price: 79.99, category: 'Electronics', stock: 30 },
    { id: 4, name: 'Monitor', price: 299.99, category: 'Electronics', stock: 20 },
    { id: 5, name: 'Desk', price: 199.99, category: 'Furniture', stock: 10 },
];

export const SAMPLE_SALES: readonly Sale[] = [
    { id: 1, productId: 1, quantity: 2, saleDate: '2025-11-15' },
    { id: 2, productId: 2, quantity: 5, saleDate: '2025-11-16' },
    { id: 3, productId: 3, quantity: 3, saleDate: '2025-11-17' },
    { id: 4, productId: 1, quantity: 1, saleDate: '2025-11-18' },
    { id: 5, productId: 4, quantity: 2, saleDate: '2025-11-18' },
];

export interface SampleDataResult {
    products: number;
    sales: number;
}

export class SampleDataService {
    constructor(
        private db: Database.Database,
        private productModel: ProductModel,
        private saleModel: SaleModel
    ) { }

    /**
     * Replaces both tables with the demo catalog. Runs as one transaction,
     * so a failed insert leaves the previous data in place.
     */
    createSampleData(): SampleDataResult {
        const seed = this.db.transaction(() => {
            // sales first: rows reference products
            this.saleModel.deleteAll();
            this.productModel.deleteAll();

            SAMPLE_PRODUCTS.forEach(product => this.productModel.create(product));
            SAMPLE_SALES.forEach(sale => this.saleModel.create(sale));
        });
        seed();

        return {
            products: this.productModel.count(),
            sales: this.saleModel.count(),
        };
    }
}
