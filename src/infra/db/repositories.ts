import { and, asc, count, desc, eq, max, sql, type SQL } from "drizzle-orm";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import type postgres from "postgres";
import {
  emptyProductTypeCounts,
  type DocumentDraft,
  type DocumentEntity,
  type ProductType,
} from "../../core/entities/document";
import type {
  DocumentStorePort,
  IdGeneratorPort,
  StoreSearchQuery,
  StoreSearchResult,
  UpsertResult,
} from "../../core/ports/outboundPorts";
import { isUuid } from "../system/systemPorts";
import { documentsTable } from "./schema";

const documentColumns = {
  id: documentsTable.id,
  productType: documentsTable.productType,
  sourceUrl: documentsTable.sourceUrl,
  title: documentsTable.title,
  headings: documentsTable.headings,
  bodyText: documentsTable.bodyText,
  fetchedAt: documentsTable.fetchedAt,
};

/**
 * Persists documents keyed by source URL and serves ranked full-text search from the generated tsvector column.
 */
export class PostgresDocumentRepositoryService implements DocumentStorePort {
  constructor(
    private readonly db: PostgresJsDatabase<Record<string, never>>,
    private readonly sqlClient: postgres.Sql<{}>,
    private readonly ids: IdGeneratorPort,
  ) {}

  /**
   * Single-statement upsert; `xmax = 0` only holds for rows the statement inserted.
   */
  async upsert(draft: DocumentDraft): Promise<UpsertResult> {
    const [row] = await this.db
      .insert(documentsTable)
      .values({ id: this.ids.next(), ...draft })
      .onConflictDoUpdate({
        target: documentsTable.sourceUrl,
        set: {
          productType: sql`excluded.product_type`,
          title: sql`excluded.title`,
          headings: sql`excluded.headings`,
          bodyText: sql`excluded.body_text`,
          fetchedAt: sql`excluded.fetched_at`,
        },
      })
      .returning({
        ...documentColumns,
        created: sql<boolean>`(xmax = 0)`,
      });

    if (!row) {
      throw new Error(`Upsert returned no row for ${draft.sourceUrl}`);
    }

    const { created, ...document } = row;
    return { document, created };
  }

  async findById(id: string): Promise<DocumentEntity | null> {
    if (!this.isValidId(id)) {
      return null;
    }

    const [row] = await this.db
      .select(documentColumns)
      .from(documentsTable)
      .where(eq(documentsTable.id, id))
      .limit(1);

    return row ?? null;
  }

  isValidId(id: string): boolean {
    return isUuid(id);
  }

  async search(query: StoreSearchQuery): Promise<StoreSearchResult> {
    const tsQuery = query.text
      ? sql`websearch_to_tsquery('english', ${query.text})`
      : undefined;

    const conditions: SQL[] = [];
    if (query.productType) {
      conditions.push(eq(documentsTable.productType, query.productType));
    }
    if (tsQuery) {
      conditions.push(sql`${documentsTable.searchVector} @@ ${tsQuery}`);
    }
    const where = conditions.length > 0 ? and(...conditions) : undefined;

    const rank = tsQuery
      ? sql<number>`ts_rank(${documentsTable.searchVector}, ${tsQuery})`
      : sql<number>`0`;

    const [rows, totals] = await Promise.all([
      this.db
        .select(documentColumns)
        .from(documentsTable)
        .where(where)
        .orderBy(desc(rank), desc(documentsTable.fetchedAt), asc(documentsTable.id))
        .offset(query.offset)
        .limit(query.limit),
      this.db.select({ total: count() }).from(documentsTable).where(where),
    ]);

    return { items: rows, total: totals[0]?.total ?? 0 };
  }

  async countByProductType(): Promise<Record<ProductType, number>> {
    const rows = await this.db
      .select({ productType: documentsTable.productType, total: count() })
      .from(documentsTable)
      .groupBy(documentsTable.productType);

    const counts = emptyProductTypeCounts();
    for (const row of rows) {
      counts[row.productType] = row.total;
    }
    return counts;
  }

  async latestFetchedAt(): Promise<Date | null> {
    const [row] = await this.db
      .select({ latest: max(documentsTable.fetchedAt) })
      .from(documentsTable);

    return row?.latest ?? null;
  }

  async ping(): Promise<boolean> {
    try {
      await this.sqlClient`select 1`;
      return true;
    } catch {
      return false;
    }
  }
}
