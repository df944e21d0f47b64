export const BOOKS_BASE_URL = "https://books.toscrape.com/";
export const BOOKS_SOURCE = "books.toscrape.com";

export const QUOTES_BASE_URL = "https://quotes.toscrape.com/";
export const QUOTES_SOURCE = "quotes.toscrape.com";

export const GEOCODER_BASE_URL = "https://api-adresse.data.gouv.fr/";
export const GEOCODER_SOURCE = "api-adresse.data.gouv.fr";

export const LIBRAIRIES_SOURCE = "partenaire_librairies.xlsx";

export const SPREADSHEET_COLUMNS = [
  "nom_librairie",
  "adresse",
  "code_postal",
  "ville",
  "contact_nom",
  "contact_email",
  "contact_telephone",
  "ca_annuel",
  "date_partenariat",
  "specialite",
] as const;

export type SpreadsheetColumn = (typeof SPREADSHEET_COLUMNS)[number];

export const SPREADSHEET_EXTENSIONS = [".xlsx"];

export const REVENUE_BUCKETS = [
  { below: 100_000, label: "< 100k€" },
  { below: 250_000, label: "100k€ - 250k€" },
  { below: 500_000, label: "250k€ - 500k€" },
  { below: 1_000_000, label: "500k€ - 1M€" },
  { below: Number.POSITIVE_INFINITY, label: "> 1M€" },
] as const;

export const REVENUE_MISSING_LABEL = "Non renseigné";

export const MAX_REPORTED_ERRORS = 50;
