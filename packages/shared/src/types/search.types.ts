export type SafeSearchLevel = 'off' | 'moderate' | 'strict';

export type Freshness = 'day' | 'week' | 'month' | 'year';

/** `auto` leaves the language to the provider; anything else is an ISO 639-1 code. */
export type LanguageHint = 'auto' | (string & {});

export interface SearchQuery {
  readonly text: string;
  readonly count: number;
  readonly languageHint: LanguageHint;
  readonly safesearch: SafeSearchLevel;
  readonly freshness?: Freshness;
  readonly country?: string;
}

export interface SearchRating {
  readonly value: string;
  readonly reviewCount?: string;
}

export interface SearchVideoInfo {
  readonly duration?: string;
  readonly views?: string;
}

export interface SearchResultItem {
  readonly title: string;
  readonly url: string;
  readonly description: string;
  readonly hostname: string;
  readonly age: string;
  readonly contentType: string;
  readonly extraSnippets: readonly string[];
  readonly articleAuthor?: string;
  readonly articleDate?: string;
  readonly rating?: SearchRating;
  readonly videoInfo?: SearchVideoInfo;
  readonly schemaTypes: readonly string[];
}

export interface SearchResponse {
  readonly originalQuery: string;
  readonly items: readonly SearchResultItem[];
}

export type SearchFailureKind =
  | 'network_timeout'
  | 'network_unreachable'
  | 'rate_limited'
  | 'auth_failed'
  | 'malformed_response'
  | 'provider_error';

export interface SearchFailure {
  readonly kind: SearchFailureKind;
  readonly message: string;
  readonly retryable: boolean;
  readonly httpStatus?: number;
}

export type SearchOutcome =
  | { readonly status: 'success'; readonly response: SearchResponse }
  | { readonly status: 'failure'; readonly failure: SearchFailure };
