export * from '@/types/transactions'
export * from '@/types/reports'
export * from '@/lib/errors'
export * from '@/lib/format'
export * from '@/lib/config'
export { decodeTable, type DecodedTable } from '@/lib/ingest/encoding'
export { parseDelimitedText, readSpreadsheet } from '@/lib/ingest/table'
export { detectDateFormat, parseTransactionDate, formatIsoDate, DateParseError } from '@/lib/ingest/dates'
export { parseAmount, AmountParseError } from '@/lib/ingest/values'
export { detectKnownLayout, inferColumnMapping, resolveColumnMapping, normalizeRecords } from '@/lib/ingest/layouts'
export { validateRecord, validateRecords, type ValidationOptions } from '@/lib/ingest/validate'
export * from '@/lib/categorize'
export * from '@/lib/reports'
export * from '@/lib/pipeline'
export * from '@/lib/session'
export { prepareAdviceSummary, type AdviceSummaryOptions } from '@/lib/insights/advice-summary'
export { PROVIDERS, loadAdviceConfig, type AdviceConfig } from '@/lib/llm/config'
export { getAdviceProvider, type ProviderForTask } from '@/lib/llm/factory'
export { generateFinancialAdvice, buildAdviceRequest, type AdviceOptions } from '@/lib/llm/generate-advice'
export type { LLMProvider, ProviderName } from '@/lib/llm/types'
