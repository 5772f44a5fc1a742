/**
 * Validation schemas for news item payloads and path parameters
 */

import { z, type ZodError } from 'zod';
import type { FieldIssue, NewsItem, NewsItemInput } from '../types/index.js';

export const TITLE_MAX_LENGTH = 255;
export const CATEGORY_MAX_LENGTH = 100;

// ============================================
// Schemas
// ============================================

/** Length in characters (code points), matching SQLite's length() on TEXT */
export function charLength(value: string): number {
  return [...value].length;
}

function boundedText(field: string, max: number) {
  return z.string().superRefine((value, ctx) => {
    const length = charLength(value);
    if (length < 1) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${field} must not be empty` });
    } else if (length > max) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${field} must be at most ${max} characters` });
    }
  });
}

export const newsItemInputSchema = z.object({
  title: boundedText('title', TITLE_MAX_LENGTH),
  body: z.string().min(1, 'body must not be empty'),
  date: z.string().date('date must be a calendar date in YYYY-MM-DD form'),
  category: boundedText('category', CATEGORY_MAX_LENGTH),
});

export const idParamSchema = z.object({
  id: z.string()
    .regex(/^[1-9]\d*$/, 'id must be a positive integer')
    .transform(Number)
    .pipe(z.number().max(Number.MAX_SAFE_INTEGER, 'id is out of range')),
});

// ============================================
// Parse Results
// ============================================

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; issues: FieldIssue[] };

export function toFieldIssues(error: ZodError): FieldIssue[] {
  return error.issues.map(issue => ({
    field: issue.path.length > 0 ? issue.path.join('.') : '(body)',
    message: issue.message,
  }));
}

export function parseNewsItemInput(payload: unknown): ParseResult<NewsItemInput> {
  const result = newsItemInputSchema.safeParse(payload);
  if (!result.success) {
    return { success: false, issues: toFieldIssues(result.error) };
  }
  return { success: true, data: result.data };
}

export function parseId(params: unknown): ParseResult<number> {
  const result = idParamSchema.safeParse(params);
  if (!result.success) {
    return { success: false, issues: toFieldIssues(result.error) };
  }
  return { success: true, data: result.data.id };
}

// ============================================
// Response Projection
// ============================================

/**
 * Project a stored record into the response shape
 */
export function toNewsItemResponse(item: NewsItem): NewsItem {
  return {
    id: item.id,
    title: item.title,
    body: item.body,
    date: item.date,
    category: item.category,
  };
}
