import { z } from 'zod'
import bankLayoutsData from '@/data/bank-layouts.json'
import categoryRulesData from '@/data/category-rules.json'

const canonicalFieldSchema = z.enum(['Date', 'Description', 'Amount', 'Category'])

// Header names are matched case-insensitively, so keys are stored lowercased
const headerMapSchema = z.record(canonicalFieldSchema)
  .transform(map => Object.fromEntries(
    Object.entries(map).map(([header, field]) => [header.trim().toLowerCase(), field])
  ))

export const bankLayoutSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  columns: headerMapSchema,
  optional: headerMapSchema.default({}),
})

export const categoryRuleSetSchema = z.object({
  incomeKeywords: z.array(z.string().min(1)),
  rules: z.array(z.object({
    category: z.string().min(1),
    keywords: z.array(z.string().min(1)).min(1),
  })),
})

export type BankLayout = z.infer<typeof bankLayoutSchema>
export type CategoryRuleSet = z.infer<typeof categoryRuleSetSchema>

export const DEFAULT_BANK_LAYOUTS: BankLayout[] = z.array(bankLayoutSchema).parse(bankLayoutsData)
export const DEFAULT_CATEGORY_RULES: CategoryRuleSet = categoryRuleSetSchema.parse(categoryRulesData)

export const DEFAULT_ENCODINGS = ['utf-8', 'latin1', 'windows-1252']
export const DEFAULT_OUTLIER_THRESHOLD = 1000
export const DEFAULT_MIN_VALID_ROWS = 10
export const DEFAULT_MAX_UPLOAD_BYTES = 10 * 1024 * 1024

export const pipelineConfigSchema = z.object({
  encodings: z.array(z.string().min(1)).min(1),
  dateOrder: z.enum(['day-first', 'month-first']),
  outlierThreshold: z.number().nonnegative(),
  minValidRows: z.number().int().nonnegative(),
  maxUploadBytes: z.number().int().positive(),
  bankLayouts: z.array(bankLayoutSchema),
  categoryRules: categoryRuleSetSchema,
})

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  encodings: DEFAULT_ENCODINGS,
  dateOrder: 'day-first',
  outlierThreshold: DEFAULT_OUTLIER_THRESHOLD,
  minValidRows: DEFAULT_MIN_VALID_ROWS,
  maxUploadBytes: DEFAULT_MAX_UPLOAD_BYTES,
  bankLayouts: DEFAULT_BANK_LAYOUTS,
  categoryRules: DEFAULT_CATEGORY_RULES,
}

const envSchema = z.object({
  STATEMENT_ENCODINGS: z.string().optional()
    .transform(v => v?.split(',').map(s => s.trim()).filter(Boolean)),
  STATEMENT_DATE_ORDER: z.enum(['day-first', 'month-first']).optional(),
  OUTLIER_THRESHOLD: z.coerce.number().nonnegative().optional(),
  MIN_VALID_ROWS: z.coerce.number().int().nonnegative().optional(),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().optional(),
})

/**
 * Builds the pipeline configuration from defaults, then environment
 * variables, then explicit overrides (tables are only swappable through
 * overrides). Throws a ZodError on malformed values.
 */
export function loadPipelineConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<PipelineConfig> = {}
): PipelineConfig {
  const parsed = envSchema.parse(env)

  return pipelineConfigSchema.parse({
    ...DEFAULT_PIPELINE_CONFIG,
    ...(parsed.STATEMENT_ENCODINGS && parsed.STATEMENT_ENCODINGS.length > 0
      ? { encodings: parsed.STATEMENT_ENCODINGS }
      : {}),
    ...(parsed.STATEMENT_DATE_ORDER ? { dateOrder: parsed.STATEMENT_DATE_ORDER } : {}),
    ...(parsed.OUTLIER_THRESHOLD !== undefined ? { outlierThreshold: parsed.OUTLIER_THRESHOLD } : {}),
    ...(parsed.MIN_VALID_ROWS !== undefined ? { minValidRows: parsed.MIN_VALID_ROWS } : {}),
    ...(parsed.MAX_UPLOAD_BYTES !== undefined ? { maxUploadBytes: parsed.MAX_UPLOAD_BYTES } : {}),
    ...overrides,
  })
}
