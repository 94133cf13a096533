/**
 * Validation of outfit query input.
 *
 * Temperature must be a whole number of degrees (an optional sign is
 * allowed). Style and weather are matched case-insensitively.
 *
 * @module features/recommendations/utils/queryValidation
 */

import { z } from 'zod';
import { InvalidInputError } from '../../../core/errors';
import { StyleFieldSchema, WeatherFieldSchema, describeIssue } from '../../catalog/utils/itemValidation';
import type { OutfitQuery } from '../types';

export const TemperatureInputSchema = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/, 'must be a whole number')
  .transform(Number);

export const OutfitQueryInputSchema = z.object({
  temperature: TemperatureInputSchema,
  style: StyleFieldSchema,
  weather: WeatherFieldSchema,
});

/**
 * Raw answers to the `find` prompts.
 */
export interface OutfitQueryInput {
  temperature: string;
  style: string;
  weather: string;
}

/**
 * Parses raw `find` answers into an outfit query.
 *
 * @throws {InvalidInputError} Naming the first rejected field
 */
export function parseOutfitQuery(input: OutfitQueryInput): OutfitQuery {
  const result = OutfitQueryInputSchema.safeParse(input);

  if (!result.success) {
    const issue = result.error.issues[0];
    throw new InvalidInputError(
      `Invalid input: ${describeIssue(issue)}`,
      issue ? issue.path.join('.') : 'query'
    );
  }

  return result.data;
}
