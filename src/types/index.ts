/**
 * Core Types for the News Items API
 * Shared between storage, validation, and the HTTP layer
 */

// ============================================
// News Items
// ============================================

/** Calendar date in ISO form, e.g. "2024-01-01" */
export type IsoDate = string;

export interface NewsItem {
  id: number;
  title: string;
  body: string;
  date: IsoDate;
  category: string;
}

/**
 * Caller-supplied fields for create and full replacement.
 * The id is always assigned by the store.
 */
export type NewsItemInput = Omit<NewsItem, 'id'>;

// ============================================
// Storage Rows
// ============================================

/** Row shape as returned by SELECT on news_items */
export interface NewsItemRow {
  id: number;
  title: string;
  body: string;
  date: string;
  category: string;
}

// ============================================
// Errors on the wire
// ============================================

export interface FieldIssue {
  field: string;
  message: string;
}

export interface ErrorResponse {
  error: string;
  details?: FieldIssue[];
}
