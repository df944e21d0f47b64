import type { RelationalStore, ResultRow, ResultValue } from "../repo/types";

export type CategoryStats = {
  category: string;
  books: number;
  avgPriceEur: number | null;
  avgRating: number | null;
  minPriceEur: number | null;
  maxPriceEur: number | null;
};

export type AuthorStats = {
  author: string;
  quotes: number;
  tags: string[];
};

export type CityStats = {
  city: string | null;
  librairies: number;
  specialties: string[];
  firstPartnership: string | null;
};

export type AnalyticsSnapshot = {
  categories: CategoryStats[];
  topAuthors: AuthorStats[];
  librairiesByCity: CityStats[];
};

export const DEFAULT_TOP_AUTHORS = 10;

// Casts keep PostgreSQL from handing NUMERIC and BIGINT back as strings.
export const ANALYTICS_QUERIES = {
  categories: `
    SELECT category_name, nb_books::int AS nb_books, avg_price_eur::float8 AS avg_price_eur,
      avg_rating::float8 AS avg_rating, min_price::float8 AS min_price, max_price::float8 AS max_price
    FROM v_stats_categories
    ORDER BY nb_books DESC, category_name`,
  topAuthors: `
    SELECT author_name, nb_quotes::int AS nb_quotes, COALESCE(tags_used, '{}') AS tags_used
    FROM v_top_authors
    ORDER BY nb_quotes DESC, author_name
    LIMIT $1`,
  librairiesByCity: `
    SELECT ville, nb_librairies::int AS nb_librairies, COALESCE(specialites, '{}') AS specialites,
      premier_partenariat::text AS premier_partenariat
    FROM v_librairies_geo
    ORDER BY nb_librairies DESC, ville`,
} as const;

const numberOf = (value: ResultValue | undefined) => {
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

const textOf = (value: ResultValue | undefined) => (typeof value === "string" ? value : null);

const listOf = (value: ResultValue | undefined) =>
  Array.isArray(value) ? value.filter((item): item is string => typeof item === "string") : [];

const toCategoryStats = (row: ResultRow): CategoryStats => ({
  category: textOf(row.category_name) ?? "",
  books: numberOf(row.nb_books) ?? 0,
  avgPriceEur: numberOf(row.avg_price_eur),
  avgRating: numberOf(row.avg_rating),
  minPriceEur: numberOf(row.min_price),
  maxPriceEur: numberOf(row.max_price),
});

const toAuthorStats = (row: ResultRow): AuthorStats => ({
  author: textOf(row.author_name) ?? "",
  quotes: numberOf(row.nb_quotes) ?? 0,
  tags: listOf(row.tags_used),
});

const toCityStats = (row: ResultRow): CityStats => ({
  city: textOf(row.ville),
  librairies: numberOf(row.nb_librairies) ?? 0,
  specialties: listOf(row.specialites),
  firstPartnership: textOf(row.premier_partenariat),
});

/** Reads the three reporting views of the gold layer. */
export const readAnalytics = async (
  store: RelationalStore,
  options: { topAuthors?: number } = {},
): Promise<AnalyticsSnapshot> => {
  const categories = await store.query(ANALYTICS_QUERIES.categories);
  const topAuthors = await store.query(ANALYTICS_QUERIES.topAuthors, [options.topAuthors ?? DEFAULT_TOP_AUTHORS]);
  const librairiesByCity = await store.query(ANALYTICS_QUERIES.librairiesByCity);

  const snapshot = {
    categories: categories.map(toCategoryStats),
    topAuthors: topAuthors.map(toAuthorStats),
    librairiesByCity: librairiesByCity.map(toCityStats),
  };
  console.log(
    `[analytics] ${snapshot.categories.length} categories, ${snapshot.topAuthors.length} authors, ` +
      `${snapshot.librairiesByCity.length} cities`,
  );
  return snapshot;
};
