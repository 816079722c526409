import { z } from 'zod';

const ISO_DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;
const ISO_DATE_MESSAGE = 'Date must be in YYYY-MM-DD format';

export const EraInterpretationSchema = z.enum(['gregorian', 'reiwa', 'heisei', 'showa']);
export type EraInterpretation = z.infer<typeof EraInterpretationSchema>;

export const InferenceMethodSchema = z.enum([
  'definite-gregorian',
  'user-confirmed',
  'bank-lookup',
  'high-probability-heisei',
  'context-based',
  'default-reiwa',
  'default-heisei',
]);
export type InferenceMethod = z.infer<typeof InferenceMethodSchema>;

export const DateFormatHintSchema = z.enum(['auto', 'western', 'wareki']);
export type DateFormatHint = z.infer<typeof DateFormatHintSchema>;

export const YearResolverKindSchema = z.enum(['simple', 'contextual']);
export type YearResolverKind = z.infer<typeof YearResolverKindSchema>;

export const DocumentTypeSchema = z.enum([
  'bank_deposit',
  'land',
  'building',
  'transaction_history',
  'unknown',
]);
export type DocumentType = z.infer<typeof DocumentTypeSchema>;

export const BankCodeSchema = z.string().regex(/^\d{4}$/, 'Bank code must be 4 digits');

export const TransactionLineSchema = z
  .object({
    transactionDate: z.string().regex(ISO_DATE_REGEX, ISO_DATE_MESSAGE).nullable(),
    description: z.string(),
    withdrawalAmount: z.number().nonnegative().nullable(),
    depositAmount: z.number().nonnegative().nullable(),
    balance: z.number().nullable(),
    confidence: z.number().min(0).max(1).nullable(),
  })
  .refine(
    (line) =>
      line.transactionDate !== null ||
      line.description !== '' ||
      line.withdrawalAmount !== null ||
      line.depositAmount !== null ||
      line.balance !== null,
    { message: 'A transaction line needs a date, a description or an amount' }
  )
  .refine((line) => line.withdrawalAmount === null || line.depositAmount === null, {
    message: 'Withdrawal and deposit cannot both be set on one line',
  });
export type TransactionLine = z.infer<typeof TransactionLineSchema>;

export const AssetRecordSchema = z.object({
  category: DocumentTypeSchema,
  type: z.string().nullable(),
  sourceDocument: z.string().min(1),
  ownerName: z.array(z.string().min(1)),
  assetName: z.string().nullable(),
  identifierPrimary: z.string().nullable(),
  identifierSecondary: z.string().nullable(),
  valuationBasis: z.string().nullable(),
  valuationCurrency: z.literal('JPY'),
  valuationAmount: z.number().nullable(),
  notes: z.string().nullable(),
  transactions: z.array(TransactionLineSchema),
});
export type AssetRecord = z.infer<typeof AssetRecordSchema>;

export const DateAlternativeSchema = z.object({
  year: z.number().int(),
  interpretation: EraInterpretationSchema,
});
export type DateAlternative = z.infer<typeof DateAlternativeSchema>;

export const DateInferenceResultSchema = z.object({
  year: z.number().int(),
  month: z.number().int(),
  day: z.number().int(),
  confidence: z.number().min(0).max(1),
  inferenceMethod: InferenceMethodSchema,
  isAmbiguous: z.boolean(),
  originalYearDigits: z.union([z.literal(2), z.literal(4)]),
  alternatives: z.array(DateAlternativeSchema),
});
export type DateInferenceResult = z.infer<typeof DateInferenceResultSchema>;

export const DateInferenceContextSchema = z.object({
  bankCode: BankCodeSchema.optional(),
  bankName: z.string().min(1).optional(),
  surroundingDates: z.array(z.string()).optional(),
  currentIndex: z.number().int().nonnegative().optional(),
  userConfirmedFormat: EraInterpretationSchema.optional(),
});
export type DateInferenceContext = z.infer<typeof DateInferenceContextSchema>;

export const ParserOptionsSchema = z.object({
  sourceName: z.string().min(1).default('document'),
  bankCode: BankCodeSchema.optional(),
  bankName: z.string().min(1).optional(),
  dateFormat: DateFormatHintSchema.default('auto'),
  yearResolver: YearResolverKindSchema.default('simple'),
  cleanDescriptions: z.boolean().default(false),
  notesLineLimit: z.number().int().positive().default(30),
});
export type ParserOptions = z.infer<typeof ParserOptionsSchema>;
