export type Domain = "books" | "quotes" | "librairies";

export type Layer = "bronze" | "silver" | "gold";

// "all" runs every stage; the others run one stage against the latest export.
export type PipelinePhase = "all" | "extract" | "transform" | "load";

export type SourceMetadata = {
  source: string;
  fetchedAt: Date;
  batchId: string;
};

// Bronze

export type RawBook = {
  title: string;
  price: string;
  ratingToken: string;
  availability: string;
  category: string;
  url: string;
  imageUrl: string | null;
  metadata: SourceMetadata;
};

export type RawQuote = {
  text: string;
  author: string;
  authorUrl: string | null;
  tags: string[];
  metadata: SourceMetadata;
};

export type RawLibrairie = {
  name: string;
  address: string;
  postcode: string;
  city: string;
  contactName: string | null;
  contactEmail: string | null;
  contactPhone: string | null;
  annualRevenue: number | null;
  partnershipDate: string | null;
  specialty: string | null;
  metadata: SourceMetadata & {
    rowNumber: number;
    containsPersonalData: true;
  };
};

export type RawGeocode = {
  query: string;
  result: GeocodeResult | null;
  metadata: SourceMetadata;
};

// Silver

export type CleanBook = {
  title: string;
  category: string;
  categorySlug: string;
  priceGbp: number;
  priceEur: number;
  rating: number;
  inStock: boolean;
  availableCount: number;
  url: string;
  imageUrl: string | null;
  contentHash: string;
  scrapedAt: Date;
  batchId: string;
};

export type CleanQuote = {
  text: string;
  textHash: string;
  author: string;
  authorSlug: string;
  authorUrl: string | null;
  tags: string[];
  scrapedAt: Date;
  batchId: string;
};

export type CleanLibrairie = {
  name: string;
  slug: string;
  address: string;
  postcode: string;
  city: string;
  specialty: string | null;
  partnershipDate: string | null;
  revenueRange: string;
  contactHash: string | null;
  latitude: number | null;
  longitude: number | null;
  geocodeScore: number | null;
  importedAt: Date;
  batchId: string;
};

// Geocoding

export type GeocodeResult = {
  latitude: number;
  longitude: number;
  label: string;
  score: number;
  city: string;
  postcode: string;
  context: string;
  type: string;
  queriedAt: Date;
};

export type ReverseGeocodeResult = {
  label: string;
  housenumber: string;
  street: string;
  city: string;
  postcode: string;
  context: string;
};

// Run bookkeeping

export type DomainCounters = {
  extracted: number;
  transformed: number;
  loaded: number;
  duplicates: number;
  invalid: number;
  failed: number;
};

export type DomainState = "pending" | "extract" | "transform" | "load" | "done" | "failed";

export type LoadSummary = {
  loaded: number;
  duplicates: number;
  failed: number;
};
