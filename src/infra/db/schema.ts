import { sql, type SQL } from "drizzle-orm";
import {
  customType,
  index,
  jsonb,
  pgEnum,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid,
} from "drizzle-orm/pg-core";
import { productTypes } from "../../core/entities/document";

const tsvector = customType<{ data: string }>({
  dataType() {
    return "tsvector";
  },
});

export const productTypeEnum = pgEnum("product_type", productTypes);

export const documentsTable = pgTable(
  "documents",
  {
    id: uuid("id").primaryKey(),
    productType: productTypeEnum("product_type").notNull(),
    sourceUrl: text("source_url").notNull(),
    title: text("title").notNull(),
    headings: jsonb("headings").$type<string[]>().notNull(),
    bodyText: text("body_text").notNull(),
    fetchedAt: timestamp("fetched_at", { withTimezone: true }).notNull(),
    // Title outranks body text, mirroring a 10:1 field weighting.
    searchVector: tsvector("search_vector").generatedAlwaysAs(
      (): SQL =>
        sql`setweight(to_tsvector('english', coalesce(${documentsTable.title}, '')), 'A') || setweight(to_tsvector('english', ${documentsTable.bodyText}), 'D')`,
    ),
  },
  (table) => ({
    sourceUrlIdx: uniqueIndex("documents_source_url_uidx").on(table.sourceUrl),
    productFetchedIdx: index("documents_product_fetched_idx").on(
      table.productType,
      table.fetchedAt.desc(),
    ),
    searchIdx: index("documents_search_idx").using("gin", table.searchVector),
  }),
);
