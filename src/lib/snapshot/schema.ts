/**
 * Zod schemas for locator records
 *
 * Validates service responses and snapshot files before analysis. Objects
 * pass unknown keys through so a snapshot round-trips unchanged.
 */

import { z } from 'zod';
import type {
  Address,
  Building,
  MeetingHours,
  Size,
  Unit,
} from '../../../shared/types/meetinghouse';

// ============================================================================
// Nested Schemas
// ============================================================================

export const addressSchema: z.ZodType<Address> = z
  .object({
    street1: z.string().optional(),
    street2: z.string().optional(),
    city: z.string().optional(),
    county: z.string().optional(),
    state: z.string().optional(),
    stateCode: z.string().optional(),
    postalCode: z.string().optional(),
    country: z.string().optional(),
    countryCode2: z.string().optional(),
    countryCode3: z.string().optional(),
    formatted: z.string().optional(),
    lines: z.array(z.string()).optional(),
  })
  .passthrough();

export const sizeSchema: z.ZodType<Size> = z
  .object({
    value: z.number().optional(),
    type: z.string().optional(),
    display: z.string().optional(),
  })
  .passthrough();

export const meetingHoursSchema: z.ZodType<MeetingHours> = z
  .object({
    code: z.string(),
  })
  .passthrough();

// ============================================================================
// Record Schemas
// ============================================================================

export const unitSchema: z.ZodType<Unit> = z
  .object({
    id: z.string().min(1),
    type: z.string(),
    subType: z.string().optional(),
    name: z.string().optional(),
    hours: meetingHoursSchema.optional(),
  })
  .passthrough();

export const buildingSchema: z.ZodType<Building> = z
  .object({
    id: z.string().min(1),
    type: z.string().optional(),
    name: z.string().optional(),
    address: addressSchema.optional(),
    coordinates: z.array(z.number()).min(2).optional(),
    associated: z.array(unitSchema).optional(),
    interiorSize: sizeSchema.optional(),
    propertySize: sizeSchema.optional(),
  })
  .passthrough();

export const snapshotSchema: z.ZodType<Building[]> = z.array(buildingSchema);

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Safely validate a list of buildings, returning a result
 */
export function safeValidateBuildings(
  input: unknown
): { success: true; data: Building[] } | { success: false; error: z.ZodError } {
  const result = snapshotSchema.safeParse(input);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}
