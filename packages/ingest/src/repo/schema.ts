export type TableName =
  | "dim_categories"
  | "dim_authors"
  | "dim_tags"
  | "dim_librairies"
  | "fact_books"
  | "fact_quotes"
  | "fact_partnerships"
  | "quote_tags";

export type TableDefinition = {
  // null for association tables keyed only by their foreign keys
  primaryKey: string | null;
  naturalKey: string[];
  columns: string[];
  required: string[];
  foreignKeys: Record<string, TableName>;
};

/**
 * Mirror of sql/schema.sql. Both stores read it: PostgreSQL for the conflict
 * target, the memory store for uniqueness and reference checks.
 */
export const TABLES: Record<TableName, TableDefinition> = {
  dim_categories: {
    primaryKey: "category_id",
    naturalKey: ["category_slug"],
    columns: ["category_name", "category_slug"],
    required: ["category_name", "category_slug"],
    foreignKeys: {},
  },
  dim_authors: {
    primaryKey: "author_id",
    naturalKey: ["author_slug"],
    columns: ["author_name", "author_slug", "author_url"],
    required: ["author_name", "author_slug"],
    foreignKeys: {},
  },
  dim_tags: {
    primaryKey: "tag_id",
    naturalKey: ["tag_name"],
    columns: ["tag_name"],
    required: ["tag_name"],
    foreignKeys: {},
  },
  dim_librairies: {
    primaryKey: "librairie_id",
    naturalKey: ["librairie_slug"],
    columns: [
      "librairie_slug",
      "nom",
      "adresse",
      "code_postal",
      "ville",
      "latitude",
      "longitude",
      "geocode_score",
      "specialite",
      "contact_hash",
      "ca_annuel_range",
      "imported_at",
      "batch_id",
    ],
    required: ["librairie_slug", "nom", "imported_at"],
    foreignKeys: {},
  },
  fact_books: {
    primaryKey: "book_id",
    naturalKey: ["content_hash"],
    columns: [
      "content_hash",
      "category_id",
      "title",
      "price_gbp",
      "price_eur",
      "rating",
      "in_stock",
      "availability",
      "url",
      "image_url",
      "image_uri",
      "scraped_at",
      "batch_id",
    ],
    required: ["content_hash", "title", "scraped_at"],
    foreignKeys: { category_id: "dim_categories" },
  },
  fact_quotes: {
    primaryKey: "quote_id",
    naturalKey: ["quote_hash"],
    columns: ["quote_hash", "author_id", "quote_text", "scraped_at", "batch_id"],
    required: ["quote_hash", "quote_text", "scraped_at"],
    foreignKeys: { author_id: "dim_authors" },
  },
  fact_partnerships: {
    primaryKey: "partnership_id",
    naturalKey: ["librairie_id"],
    columns: ["librairie_id", "date_partenariat", "ca_annuel_range", "batch_id"],
    required: ["librairie_id"],
    foreignKeys: { librairie_id: "dim_librairies" },
  },
  quote_tags: {
    primaryKey: null,
    naturalKey: ["quote_id", "tag_id"],
    columns: ["quote_id", "tag_id"],
    required: ["quote_id", "tag_id"],
    foreignKeys: { quote_id: "fact_quotes", tag_id: "dim_tags" },
  },
};

export const unknownColumns = (table: TableName, fields: Record<string, unknown>) => {
  const known = new Set(TABLES[table].columns);
  return Object.keys(fields).filter((column) => !known.has(column));
};
