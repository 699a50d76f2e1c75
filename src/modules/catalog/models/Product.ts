import Database from "better-sqlite3";

export interface Product {
    id: number,
    name: string,
    price: number | null,
    category: string | null,
    stock: number | null,
}

export class ProductModel {
    private db: Database.Database;

    constructor(db: Database.Database) {
        this.db = db;
    }

    initialize(): void {
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS products (
            id INTEGER PRIMARY KEY,
            name TEXT NOT NULL,
            price REAL,
            category TEXT,
            stock INTEGER
            )
            `);
        this.db.exec('CREATE INDEX IF NOT EXISTS idx_products_name ON products(name)');
    }

    create(data: Product): Product {
        const stmt = this.db.prepare<Product>(`
            INSERT INTO products (id, name, price, category, stock)
            VALUES ($id, $name, $price, $category, $stock)
        `);
        const info = stmt.run(data);
        return { ...data, id: Number(info.lastInsertRowid) };
    }

    count(): number {
        const row = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM products').get();
        return row ? row.total : 0;
    }

    deleteAll(): number {
        return this.db.prepare('DELETE FROM products').run().changes;
    }
}
