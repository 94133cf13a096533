/**
 * The `find` command: asks for today's conditions and prints an outfit.
 *
 * @module cli/commands/findOutfit
 */

import type { Catalog } from '../../features/catalog';
import {
  assembleOutfit,
  formatOutfitReport,
  parseOutfitQuery,
  type RandomSource,
} from '../../features/recommendations';
import type { Logger } from '../../core/logging/structuredLogger';
import type { Prompter } from '../prompter';
import type { CommandOutcome } from './types';

export const FIND_PROMPTS = {
  temperature: 'What is the temperature today: ',
  style: 'What is the style today (casual/formal): ',
  weather: 'Is it rainy or sunny outside? (rainy/sunny): ',
} as const;

export interface FindOutfitDeps {
  prompter: Prompter;
  logger: Logger;
  random: RandomSource;
}

/**
 * Runs the `find` dialogue against the current catalog.
 *
 * @throws {InvalidInputError} If an answer is rejected
 */
export async function findOutfit(catalog: Catalog, deps: FindOutfitDeps): Promise<CommandOutcome> {
  const { prompter, logger, random } = deps;

  const temperature = await prompter.ask(FIND_PROMPTS.temperature);
  if (temperature === null) {
    return { kind: 'end-of-input' };
  }
  const style = await prompter.ask(FIND_PROMPTS.style);
  if (style === null) {
    return { kind: 'end-of-input' };
  }
  const weather = await prompter.ask(FIND_PROMPTS.weather);
  if (weather === null) {
    return { kind: 'end-of-input' };
  }

  const query = parseOutfitQuery({ temperature, style, weather });
  const outfit = assembleOutfit(catalog, query, random);

  formatOutfitReport(outfit).forEach((line) => prompter.print(line));

  logger.info('outfit_assembled', {
    item_count: outfit.slots.filter((slot) => slot.item !== null).length,
    metadata: {
      temperature_band: outfit.temperatureBand,
      style: query.style,
      weather: query.weather,
      includes_jacket: outfit.includesJacket,
    },
  });

  return { kind: 'continue', catalog };
}
