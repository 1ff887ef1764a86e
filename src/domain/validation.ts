import { z } from 'zod';
import { ValidationError } from '../errors';
import { isIsoDate } from './dates';
import {
  AGREEMENT_STATUSES,
  AGREEMENT_TYPES,
  AGREEMENT_TYPE_ALIASES,
  BASE_CURRENCY,
  CURRENCIES,
  CUSTOMER_SEGMENTS,
  CUSTOMER_SEGMENT_ALIASES,
} from './enums';

const withAliases = (aliases: Readonly<Record<string, string>>) => (value: unknown) => {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim();
  return aliases[trimmed] ?? trimmed;
};

export const customerSegmentSchema = z.preprocess(withAliases(CUSTOMER_SEGMENT_ALIASES), z.enum(CUSTOMER_SEGMENTS));
export const agreementTypeSchema = z.preprocess(withAliases(AGREEMENT_TYPE_ALIASES), z.enum(AGREEMENT_TYPES));
export const agreementStatusSchema = z.preprocess(withAliases({}), z.enum(AGREEMENT_STATUSES));
export const currencySchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toUpperCase() : value),
  z.enum(CURRENCIES),
);

const requiredText = z.string().trim().min(1, 'is required');
const optionalText = z
  .string()
  .trim()
  .transform((value) => (value === '' ? null : value))
  .nullable()
  .optional();

const isoDate = z.string().trim().refine(isIsoDate, 'must be a YYYY-MM-DD date');
const optionalDate = isoDate.nullable().optional();

const positiveAmount = z.coerce.number().finite().positive('must be greater than 0');
const probability = z.coerce.number().min(0).max(100).nullable().optional();

const agreementFields = {
  name: requiredText,
  customerName: requiredText,
  customerSegment: customerSegmentSchema,
  agreementType: agreementTypeSchema,
  accountManager: requiredText,
  valueCeiling: positiveAmount,
  currency: currencySchema,
  status: agreementStatusSchema,
  statusDate: isoDate,
  region: optionalText,
  industry: optionalText,
  startDate: optionalDate,
  endDate: optionalDate,
  salesOwner: optionalText,
  partnershipsVendors: optionalText,
  probabilityToSign: probability,
  expectedSignatureDate: optionalDate,
  signedDate: optionalDate,
  renewalTerms: optionalText,
  notes: optionalText,
  attachments: optionalText,
};

export const newAgreementSchema = z.object({
  ...agreementFields,
  currency: currencySchema.default(BASE_CURRENCY),
  status: agreementStatusSchema.default('Pipeline'),
  statusDate: isoDate.optional(),
});

/** Partial update: keys left out are not touched. */
export const agreementPatchSchema = z.object(agreementFields).partial();

export const newPurchaseOrderSchema = z.object({
  agreementId: requiredText,
  poNumber: optionalText,
  date: isoDate,
  value: positiveAmount,
  currency: currencySchema.default(BASE_CURRENCY),
  customerName: optionalText,
  accountManager: optionalText,
  notes: optionalText,
});

export type ParsedNewAgreement = z.output<typeof newAgreementSchema>;
export type ParsedAgreementPatch = z.output<typeof agreementPatchSchema>;
export type ParsedNewPurchaseOrder = z.output<typeof newPurchaseOrderSchema>;

/**
 * Run a schema and turn its failure into a ValidationError naming every bad field.
 */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown, subject: string): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ValidationError(`Invalid ${subject}: ${problems}`, result.error.issues);
  }
  return result.data;
}

export const parseNewAgreement = (input: unknown): ParsedNewAgreement =>
  parseOrThrow(newAgreementSchema, input, 'agreement');

export const parseAgreementPatch = (input: unknown): ParsedAgreementPatch =>
  parseOrThrow(agreementPatchSchema, input, 'agreement update');

export const parseNewPurchaseOrder = (input: unknown): ParsedNewPurchaseOrder =>
  parseOrThrow(newPurchaseOrderSchema, input, 'purchase order');
