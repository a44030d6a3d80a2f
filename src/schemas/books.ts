import { z } from '@hono/zod-openapi';
import { PaginationMetadataSchema, PaginationQuerySchema } from './common.js';
import { createSuccessSchema } from './response.js';
import {
  MAX_AUTHOR_LENGTH,
  MAX_SHORT_TEXT_LENGTH,
  MAX_SUMMARY_LENGTH,
  MAX_TITLE_LENGTH,
} from '../lib/constants.js';

// =================================================================================
// Field Validators
// =================================================================================

const requiredText = (field: string, max: number) =>
  z.string({ required_error: `${field} is required` })
    .trim()
    .min(1, `${field} must not be empty`)
    .max(max, `${field} must be at most ${max} characters`);

const TitleSchema = requiredText('title', MAX_TITLE_LENGTH);
const AuthorSchema = requiredText('author', MAX_AUTHOR_LENGTH);
const GenreSchema = requiredText('genre', MAX_SHORT_TEXT_LENGTH);
const LanguageSchema = requiredText('language', MAX_SHORT_TEXT_LENGTH);
const PublisherSchema = requiredText('publisher', MAX_SHORT_TEXT_LENGTH);

const PublishedDateSchema = z.string()
  .date('published_date must be a YYYY-MM-DD date')
  .refine((val) => Date.parse(val) <= Date.now(), {
    message: 'published_date must not be in the future',
  });

// Hyphens and spaces are dropped; the ISBN-10 check digit may be 'X'
export const IsbnSchema = z.string()
  .transform((val) => val.replace(/[\s-]/g, '').toUpperCase())
  .refine((val) => /^\d{13}$/.test(val) || /^\d{9}[\dX]$/.test(val), {
    message: "ISBN must be 10 or 13 characters (digits and 'X' for ISBN-10 check digit)",
  })
  .openapi('ISBN', { example: '9780441013593' });

const PagesSchema = z.number().int().positive('pages must be a positive integer');
const EditionSchema = z.number().int().positive('edition must be a positive integer');
const CoverImageSchema = z.string().url('cover_image must be a URL').max(2048);
const SummarySchema = z.string().trim().max(MAX_SUMMARY_LENGTH);

// =================================================================================
// Request Schemas
// =================================================================================

export const CreateBookSchema = z.object({
  title: TitleSchema,
  author: AuthorSchema,
  genre: GenreSchema.optional(),
  published_date: PublishedDateSchema.optional(),
  language: LanguageSchema.optional(),
  isbn: IsbnSchema.optional(),
  pages: PagesSchema.optional(),
  publisher: PublisherSchema.optional(),
  edition: EditionSchema.optional(),
  cover_image: CoverImageSchema.optional(),
  summary: SummarySchema.optional(),
}).strict().openapi('CreateBookRequest', {
  example: { title: 'Dune', author: 'Herbert', genre: 'Sci-Fi' },
});

// Required fields may change but never be cleared; optional ones are removed with null
export const UpdateBookSchema = z.object({
  title: TitleSchema.optional(),
  author: AuthorSchema.optional(),
  genre: GenreSchema.nullable().optional(),
  published_date: PublishedDateSchema.nullable().optional(),
  language: LanguageSchema.nullable().optional(),
  isbn: IsbnSchema.nullable().optional(),
  pages: PagesSchema.nullable().optional(),
  publisher: PublisherSchema.nullable().optional(),
  edition: EditionSchema.nullable().optional(),
  cover_image: CoverImageSchema.nullable().optional(),
  summary: SummarySchema.nullable().optional(),
}).strict()
  .refine((patch) => Object.keys(patch).length > 0, {
    message: 'At least one field must be provided',
  })
  .openapi('UpdateBookRequest', {
    example: { genre: 'Science Fiction', pages: 412 },
  });

export const SearchMatchSchema = z.enum(['partial', 'exact']);

// Blank criteria pass through; the search decides whether any criterion is left
const criterionText = (field: string, max: number) =>
  z.string().trim().max(max, `${field} must be at most ${max} characters`);

export const BookSearchQuerySchema = z.object({
  title: criterionText('title', MAX_TITLE_LENGTH).optional().openapi({ param: { name: 'title', in: 'query' }, example: 'dune' }),
  author: criterionText('author', MAX_AUTHOR_LENGTH).optional().openapi({ param: { name: 'author', in: 'query' }, example: 'Herbert' }),
  genre: criterionText('genre', MAX_SHORT_TEXT_LENGTH).optional().openapi({ param: { name: 'genre', in: 'query' }, example: 'Sci-Fi' }),
  match: SearchMatchSchema.default('partial').openapi({
    param: { name: 'match', in: 'query' },
    description: '"partial" matches substrings, "exact" the whole field; both ignore case',
  }),
}).merge(PaginationQuerySchema).openapi('BookSearchQuery');

// =================================================================================
// Response Schemas
// =================================================================================

export const BookSchema = z.object({
  id: z.string().uuid(),
  title: z.string(),
  author: z.string(),
  genre: z.string().optional(),
  published_date: z.string().optional(),
  language: z.string().optional(),
  isbn: z.string().optional(),
  pages: z.number().optional(),
  publisher: z.string().optional(),
  edition: z.number().optional(),
  cover_image: z.string().optional(),
  summary: z.string().optional(),
  created_at: z.string().datetime(),
  updated_at: z.string().datetime(),
}).openapi('Book');

export const BookListDataSchema = z.object({
  books: z.array(BookSchema),
  pagination: PaginationMetadataSchema,
}).openapi('BookListData');

export const BookSearchDataSchema = z.object({
  query: z.object({
    title: z.string().optional(),
    author: z.string().optional(),
    genre: z.string().optional(),
    match: SearchMatchSchema,
  }),
  books: z.array(BookSchema),
  pagination: PaginationMetadataSchema,
}).openapi('BookSearchData');

export const DeletedDataSchema = z.object({
  id: z.string().uuid(),
  deleted: z.literal(true),
}).openapi('DeletedData');

export const BookSuccessSchema = createSuccessSchema(BookSchema, 'BookSuccess');
export const BookListSuccessSchema = createSuccessSchema(BookListDataSchema, 'BookListSuccess');
export const BookSearchSuccessSchema = createSuccessSchema(BookSearchDataSchema, 'BookSearchSuccess');
export const DeletedSuccessSchema = createSuccessSchema(DeletedDataSchema, 'DeletedSuccess');

// =================================================================================
// Type Exports
// =================================================================================

export type CreateBookInput = z.input<typeof CreateBookSchema>;
export type BookDocument = z.output<typeof CreateBookSchema>;
export type BookPatch = z.output<typeof UpdateBookSchema>;
export type SearchMatch = z.infer<typeof SearchMatchSchema>;
export type BookSearchQuery = z.infer<typeof BookSearchQuerySchema>;
export type Book = z.infer<typeof BookSchema>;
export type BookListData = z.infer<typeof BookListDataSchema>;
export type BookSearchData = z.infer<typeof BookSearchDataSchema>;
