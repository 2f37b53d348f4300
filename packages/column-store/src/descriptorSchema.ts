/**
 * zod schema for persisted instrument descriptors.
 */

import { z } from 'zod'
import { MAX_PRICE_PRECISION } from '@barvault/contracts'

export const InstrumentDescriptorSchema = z
  .object({
    instrumentId: z.string().min(3),
    symbol: z.string().min(1),
    venue: z.string().min(1),
    assetClass: z.string().min(1),
    currency: z.string().min(1),
    pricePrecision: z.number().int().min(0).max(MAX_PRICE_PRECISION),
    tickSize: z.string().regex(/^\d+(\.\d+)?$/, 'tickSize must be decimal text'),
    lotSize: z.number().positive(),
  })
  .refine((descriptor) => descriptor.instrumentId === `${descriptor.symbol}.${descriptor.venue}`, {
    message: 'instrumentId must equal SYMBOL.VENUE',
    path: ['instrumentId'],
  })
  .refine((descriptor) => (descriptor.tickSize.split('.')[1]?.length ?? 0) === descriptor.pricePrecision, {
    message: 'pricePrecision must match the decimal places of tickSize',
    path: ['pricePrecision'],
  })

export function formatDescriptorIssues(error: z.ZodError): string {
  return error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
}

