/**
 * Ordered venue lookup: descriptor first, then the bars' own instrument
 * id, then the configured simulation venue.
 */

import { parseInstrumentId } from '@barvault/contracts'
import type { Bar, InstrumentDescriptor } from '@barvault/contracts'

export const DEFAULT_VENUE = 'SIM'

export type VenueSource = 'descriptor' | 'bars' | 'default'

export interface VenueContext {
  instrumentId: string
  descriptor: InstrumentDescriptor | null
  bars: readonly Bar[]
}

export interface VenueResolverStep {
  source: VenueSource
  resolve(context: VenueContext): string | null
}

export interface ResolvedVenue {
  venue: string
  source: VenueSource
}

export const descriptorVenueStep: VenueResolverStep = {
  source: 'descriptor',
  resolve: (context) => context.descriptor?.venue || null,
}

export const barsVenueStep: VenueResolverStep = {
  source: 'bars',
  resolve: (context) => {
    const first = context.bars[0]
    return first ? parseInstrumentId(first.instrumentId).venue : null
  },
}

export function defaultVenueStep(venue: string = DEFAULT_VENUE): VenueResolverStep {
  return { source: 'default', resolve: () => venue }
}

export function createVenueResolvers(defaultVenue: string = DEFAULT_VENUE): VenueResolverStep[] {
  return [descriptorVenueStep, barsVenueStep, defaultVenueStep(defaultVenue)]
}

/**
 * First step that yields a venue wins. Falls back to the default venue when
 * no step answers.
 */
export function resolveVenue(
  context: VenueContext,
  steps: readonly VenueResolverStep[] = createVenueResolvers()
): ResolvedVenue {
  for (const step of steps) {
    const venue = step.resolve(context)
    if (venue) {
      return { venue, source: step.source }
    }
  }
  return { venue: DEFAULT_VENUE, source: 'default' }
}
