/**
 * Prompt templates for structured field extraction from single documents.
 *
 * Field names here must match the zod schemas in `@/lib/extraction/schemas`:
 * in JSON mode the prompt is the only thing telling the model the shape.
 */

export const COST_CATEGORIES = [
  'Salaries',
  'Rent',
  'Supplies',
  'Transport',
  'Services',
  'Other',
] as const;

export const PROFIT_SOURCES = [
  'donation',
  'grant',
  'sales',
  'service_fee',
  'fundraiser',
  'bank_transfer',
  'other',
] as const;

export function buildCostExtractionPrompt(): string {
  return `You extract expense data from receipts, invoices and bills of a nonprofit organization.

Return one JSON object with these fields (use null when a field is not stated):
- date: date of purchase, YYYY-MM-DD when possible
- vendor: name of the store or supplier
- category: one of ${COST_CATEGORIES.join(', ')}
- description: short description of what was bought
- amount: total amount as a plain number without currency symbols
- currency: ISO currency code such as EUR or USD
- items: individual line items, each {name, amount, quantity, unit}
- confidence: your confidence in the extraction, from 0.0 to 1.0

Return ONLY the JSON object.`;
}

export function buildProfitExtractionPrompt(): string {
  return `You extract revenue data from financial documents of a nonprofit organization.

Only INCOMING money counts, never expenses:
- Donation receipts: donation amount, donor, date and purpose
- Bank statements: only credit (incoming) transactions
- Invoices the organization sent: the total it is receiving
- Grant awards: grant amount, funder and date

Return one JSON object with these fields (use null when a field is not stated):
- date: transaction date, YYYY-MM-DD when possible
- source: one of ${PROFIT_SOURCES.join(', ')}
- amount: total amount received as a plain number without currency symbols
- currency: ISO currency code such as EUR or USD
- donorName: donor, payer or client when clearly stated
- description: what the revenue is for
- reference: transaction reference, invoice number or donation ID
- transactionItems: for statements with several credits, each as {date, description, amount}
- confidence: your confidence in the extraction, from 0.0 to 1.0

Examples:
- Donation receipt "€2,500" gives amount 2500 and source "donation"
- Bank statement "Transfer IN: +€25,000" gives amount 25000 and source "bank_transfer"

Return ONLY the JSON object.`;
}

export function buildExtractionUserPrompt(subject: string, text: string): string {
  return `Extract ${subject} data from this document:\n\n${text}`;
}
