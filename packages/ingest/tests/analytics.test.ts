import { describe, expect, it } from "vitest";
import { ANALYTICS_QUERIES, readAnalytics } from "../src/lib/analytics";
import { MemoryStore } from "../src/repo/memory";

describe("readAnalytics", () => {
  it("maps the three views", async () => {
    const store = new MemoryStore();
    store.setQueryResult(ANALYTICS_QUERIES.categories, [
      {
        category_name: "Poetry",
        nb_books: "2",
        avg_price_eur: "30.50",
        avg_rating: 3,
        min_price: 20,
        max_price: 41,
      },
      { category_name: "Travel", nb_books: 0, avg_price_eur: null, avg_rating: null, min_price: null, max_price: null },
    ]);
    store.setQueryResult(ANALYTICS_QUERIES.topAuthors, [
      { author_name: "Albert Einstein", nb_quotes: 3, tags_used: ["change", "life"] },
    ]);
    store.setQueryResult(ANALYTICS_QUERIES.librairiesByCity, [
      { ville: "Paris", nb_librairies: 2, specialites: ["Jeunesse", null], premier_partenariat: "2021-03-15" },
    ]);

    const snapshot = await readAnalytics(store, { topAuthors: 5 });

    expect(snapshot).toEqual({
      categories: [
        { category: "Poetry", books: 2, avgPriceEur: 30.5, avgRating: 3, minPriceEur: 20, maxPriceEur: 41 },
        { category: "Travel", books: 0, avgPriceEur: null, avgRating: null, minPriceEur: null, maxPriceEur: null },
      ],
      topAuthors: [{ author: "Albert Einstein", quotes: 3, tags: ["change", "life"] }],
      librairiesByCity: [{ city: "Paris", librairies: 2, specialties: ["Jeunesse"], firstPartnership: "2021-03-15" }],
    });
    expect(store.queries[1].params).toEqual([5]);
  });

  it("fails on a closed store", async () => {
    const store = new MemoryStore();
    await store.close();

    await expect(readAnalytics(store)).rejects.toThrow("query: store is closed");
  });
});
