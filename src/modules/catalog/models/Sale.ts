import Database from "better-sqlite3";

export interface Sale {
    id: number,
    productId: number,
    quantity: number,
    saleDate?: string,
}

export class SaleModel {
    private db: Database.Database;

    constructor(db: Database.Database) {
        this.db = db;
    }

    initialize(): void {
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS sales (
            id INTEGER PRIMARY KEY,
            product_id INTEGER,
            quantity INTEGER,
            sale_date DATE,
            FOREIGN KEY (product_id) REFERENCES products(id)
            )
            `);
        this.db.exec('CREATE INDEX IF NOT EXISTS idx_sales_product_id ON sales(product_id)');
    }

    create(data: Sale): Sale {
        const stmt = this.db.prepare<{ id: number; productId: number; quantity: number; saleDate: string | null }>(`
            INSERT INTO sales (id, product_id, quantity, sale_date)
            VALUES ($id, $productId, $quantity, $saleDate)
        `);
        const info = stmt.run({
            id: data.id,
            productId: data.productId,
            quantity: data.quantity,
            saleDate: data.saleDate ?? null,
        });
        return { ...data, id: Number(info.lastInsertRowid) };
    }

    count(): number {
        const row = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM sales').get();
        return row ? row.total : 0;
    }

    deleteAll(): number {
        return this.db.prepare('DELETE FROM sales').run().changes;
    }
}
