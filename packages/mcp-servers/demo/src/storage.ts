/**
 * SQLite Storage Layer for the Demo Server
 *
 * Owns the products table: schema migration on open, one-time seeding,
 * and read access for the products resource.
 */

import Database from 'better-sqlite3';
import { z } from 'zod';
import { StoreError, createLogger, errorMessage, now } from '@mcp-demo/shared';
import type { Logger, NewProduct, Product } from '@mcp-demo/shared';

export interface StorageConfig {
  dbPath: string;
  /** Clock used for created/updated timestamps */
  now?: () => string;
  logger?: Logger;
}

/**
 * Read side of the store, as seen by resource handlers.
 */
export interface ProductReader {
  listAll(signal?: AbortSignal): Product[];
}

export const SAMPLE_PRODUCTS: readonly NewProduct[] = [
  { code: 'D42', price: 100 },
  { code: 'P99', price: 200 },
];

export class ProductStore implements ProductReader {
  private readonly db: Database.Database;
  private readonly now: () => string;
  private readonly logger: Logger;

  constructor(config: StorageConfig) {
    this.now = config.now ?? now;
    this.logger = config.logger ?? createLogger('product-store');
    this.db = openDatabase(config.dbPath);
    this.initialize();
  }

  /**
   * Initialize database schema
   */
  private initialize(): void {
    try {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS products (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          created_at TEXT NOT NULL,
          updated_at TEXT NOT NULL,
          deleted_at TEXT,
          code TEXT NOT NULL,
          price REAL NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_products_deleted_at ON products(deleted_at);
      `);
    } catch (error) {
      this.db.close();
      throw new StoreError('MigrationError', `failed to migrate database: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Number of live (not soft-deleted) products
   */
  count(): number {
    try {
      return this.countLive();
    } catch (error) {
      throw new StoreError('RetrievalError', `failed to count products: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Insert the sample products when the table holds no live rows.
   * Count and insert share one transaction, so a second call never duplicates.
   *
   * @returns Number of rows inserted (0 when the table was already populated)
   */
  seedIfEmpty(products: readonly NewProduct[] = SAMPLE_PRODUCTS): number {
    try {
      const insert = this.db.prepare(`
        INSERT INTO products (created_at, updated_at, deleted_at, code, price)
        VALUES (?, ?, NULL, ?, ?)
      `);

      const seed = this.db.transaction((batch: readonly NewProduct[]): number => {
        if (this.countLive() > 0) {
          return 0;
        }

        const timestamp = this.now();
        for (const product of batch) {
          insert.run(timestamp, timestamp, product.code, product.price);
        }
        return batch.length;
      });

      const inserted = seed(products);
      if (inserted > 0) {
        this.logger.info('Database seeded with sample products');
      }
      return inserted;
    } catch (error) {
      throw new StoreError('SeedError', `failed to seed database: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * All live products, oldest first (id ascending)
   */
  listAll(signal?: AbortSignal): Product[] {
    signal?.throwIfAborted();

    try {
      const rows = this.db
        .prepare(
          `SELECT id, code, price, created_at, updated_at, deleted_at
           FROM products
           WHERE deleted_at IS NULL
           ORDER BY id ASC`
        )
        .all();

      return rows.map((row) => rowToProduct(ProductRow.parse(row)));
    } catch (error) {
      throw new StoreError('RetrievalError', `failed to retrieve products: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Close database connection
   */
  close(): void {
    this.db.close();
  }

  private countLive(): number {
    const row = this.db.prepare('SELECT COUNT(*) AS count FROM products WHERE deleted_at IS NULL').get();
    return CountRow.parse(row).count;
  }
}

// ============================================================================
// Private helpers
// ============================================================================

function openDatabase(dbPath: string): Database.Database {
  try {
    return new Database(dbPath);
  } catch (error) {
    throw new StoreError('ConnectionError', `failed to connect database: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

// Row shapes for SQLite results
const ProductRow = z.object({
  id: z.number().int(),
  code: z.string(),
  price: z.number(),
  created_at: z.string(),
  updated_at: z.string(),
  deleted_at: z.string().nullable(),
});
type ProductRow = z.infer<typeof ProductRow>;

const CountRow = z.object({ count: z.number().int() });

function rowToProduct(row: ProductRow): Product {
  return {
    id: row.id,
    code: row.code,
    price: row.price,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    deletedAt: row.deleted_at,
  };
}
