export type CandidateSource =
  | "structured_data"
  | "container"
  | "dropdown"
  | "button_group"
  | "data_attribute"
  | "interactive";

export type DimensionType = "color" | "size" | "storage" | "style" | "material";

export type OptionType = DimensionType | "quantity" | "unrelated" | "unknown";

export type VerificationMethod = "ai" | "rule_based";

export type PageContent = {
  html: string;
  snapshots?: string[];
  sourceUrl?: string;
};

export type ProductContext = {
  title: string;
  basePrice: number | string | null;
  productId?: string;
};

export type Candidate = Readonly<{
  rawText: string;
  source: CandidateSource;
  containerHint: string;
  declaredPriceCents?: number;
  declaredStock?: number;
  sku?: string;
  images: readonly string[];
}>;

export type ClassifiedOption = Candidate &
  Readonly<{
    inferredType: OptionType;
    confidence: number;
    dimension: string;
  }>;

export type FilteredOption = ClassifiedOption &
  Readonly<{
    lowConfidence: boolean;
  }>;

export type Variant = {
  type: string;
  name: string;
  priceCents: number | null;
  stock: number | null;
  sku: string | null;
  images: string[];
};

export type VerificationVerdict = {
  variants: Variant[];
  method: VerificationMethod;
  confidence: number;
};

export type NoiseRule =
  | "EMPTY"
  | "TOO_LONG"
  | "QUANTITY_TOKEN"
  | "QUANTITY_PREFIX"
  | "UI_PHRASE"
  | "PRICE_ONLY"
  | "AGGREGATE_OFFER"
  | "MEDIA_COUNTER"
  | "NAVIGATION"
  | "TYPE_QUANTITY"
  | "TYPE_UNRELATED"
  | "SHADOWED_UNKNOWN";

export type RejectedOption = {
  option: ClassifiedOption;
  rule: NoiseRule;
};

export type VerifierUnavailableReason =
  | "DISABLED"
  | "NO_CANDIDATES"
  | "NO_CREDENTIAL"
  | "NETWORK_ERROR"
  | "TIMEOUT"
  | "EMPTY_RESPONSE"
  | "MALFORMED_RESPONSE"
  | "SCHEMA_MISMATCH";

export type VerifierUsage = {
  tokenInput: number;
  tokenOutput: number;
  estimatedCostUsd: number;
};

export type VerificationResult =
  | {
      status: "verified";
      options: FilteredOption[];
      usage: VerifierUsage;
    }
  | {
      status: "unavailable";
      reason: VerifierUnavailableReason;
    };

export type CollectionReport = {
  candidates: Candidate[];
  perStrategy: Record<CandidateSource, number>;
  clicks: number;
  timedOut: boolean;
  warnings: string[];
};

export type ExtractionOutcome =
  | {
      status: "success";
      verdict: VerificationVerdict;
      degraded: boolean;
      warnings: string[];
      candidateCount: number;
      rejected: RejectedOption[];
      verifier: { status: VerificationResult["status"]; reason?: VerifierUnavailableReason; usage?: VerifierUsage };
    }
  | {
      status: "cancelled";
      reason: "CANCELLATION_REQUESTED";
    };
