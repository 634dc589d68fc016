/**
 * Segment Classifications
 *
 * Closed variant sets for turn, elevation, banking and style, with their
 * associated constants. Lookup tables are exhaustive over each union so
 * adding a variant without its constants fails to compile.
 */

import type { TrackSegment } from './types';

export const TURN_ANGLES = [
  'Straight',
  'Gentle15L', 'Gentle15R',
  'Medium30L', 'Medium30R',
  'Standard45L', 'Standard45R',
  'Sharp60L', 'Sharp60R',
  'Tight90L', 'Tight90R',
  'Hairpin180L', 'Hairpin180R',
] as const;
export type TurnAngle = (typeof TURN_ANGLES)[number];

export const ELEVATIONS = [
  'Flat', 'GentleUp', 'GentleDown', 'SteepUp', 'SteepDown', 'Crest', 'Valley', 'Jump', 'Bridge',
] as const;
export type Elevation = (typeof ELEVATIONS)[number];

export const BANKINGS = ['Flat', 'Slight', 'Medium', 'Heavy'] as const;
export type Banking = (typeof BANKINGS)[number];

export const SEGMENT_STYLES = ['Open', 'Tunnel', 'Bridge', 'Canyon', 'Coastal'] as const;
export type SegmentStyle = (typeof SEGMENT_STYLES)[number];

// ──────────────────────────────────────────────────────────
// Turn
// ──────────────────────────────────────────────────────────

/** Signed rotation, positive = right/clockwise. */
const TURN_DEGREES: Record<TurnAngle, number> = {
  Straight: 0,
  Gentle15L: -15, Gentle15R: 15,
  Medium30L: -30, Medium30R: 30,
  Standard45L: -45, Standard45R: 45,
  Sharp60L: -60, Sharp60R: 60,
  Tight90L: -90, Tight90R: 90,
  Hairpin180L: -180, Hairpin180R: 180,
};

/** Sharper turns get longer arcs so corner speed feels the same. */
const TURN_LENGTH_MULT: Record<TurnAngle, number> = {
  Straight: 1.0,
  Gentle15L: 1.0, Gentle15R: 1.0,
  Medium30L: 1.0, Medium30R: 1.0,
  Standard45L: 1.0, Standard45R: 1.0,
  Sharp60L: 1.2, Sharp60R: 1.2,
  Tight90L: 1.5, Tight90R: 1.5,
  Hairpin180L: 2.0, Hairpin180R: 2.0,
};

export function turnDegrees(turn: TurnAngle): number {
  return TURN_DEGREES[turn];
}

export function turnLengthMultiplier(turn: TurnAngle): number {
  return TURN_LENGTH_MULT[turn];
}

// ──────────────────────────────────────────────────────────
// Elevation
// ──────────────────────────────────────────────────────────

const ELEVATION_HEIGHT: Record<Elevation, number> = {
  Flat: 0,
  GentleUp: 2,
  GentleDown: -2,
  SteepUp: 4,
  SteepDown: -4,
  Crest: 1,
  Valley: -1,
  Jump: 3,
  Bridge: 0,
};

/** Visual pitch in degrees; negative = nose up. */
const ELEVATION_PITCH: Record<Elevation, number> = {
  Flat: 0,
  GentleUp: -8,
  GentleDown: 8,
  SteepUp: -15,
  SteepDown: 15,
  Crest: -5,
  Valley: 5,
  Jump: -20,
  Bridge: 0,
};

/** Height change over the segment. */
export function elevationHeightDelta(elevation: Elevation): number {
  return ELEVATION_HEIGHT[elevation];
}

export function elevationPitch(elevation: Elevation): number {
  return ELEVATION_PITCH[elevation];
}

// ──────────────────────────────────────────────────────────
// Banking
// ──────────────────────────────────────────────────────────

const BANKING_ANGLE: Record<Banking, number> = {
  Flat: 0,
  Slight: 10,
  Medium: 20,
  Heavy: 30,
};

export function bankingAngle(banking: Banking): number {
  return BANKING_ANGLE[banking];
}

// ──────────────────────────────────────────────────────────
// Derived segment angles
// ──────────────────────────────────────────────────────────

/** Roll in degrees: the bank leans into the turn, none on straights. */
export function segmentRoll(segment: Pick<TrackSegment, 'turn' | 'banking'>): number {
  return bankingAngle(segment.banking) * Math.sign(turnDegrees(segment.turn));
}

export function segmentPitch(segment: Pick<TrackSegment, 'elevation'>): number {
  return elevationPitch(segment.elevation);
}
