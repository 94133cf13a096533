/**
 * Interactive session loop.
 *
 * Prompts for an action until `quit` or end of input:
 * - find: assemble and print an outfit
 * - add: append a new item to the catalog
 * - quit: end the session
 *
 * Rejected input and failed appends are reported to the user and the loop
 * continues. The session owns the catalog handle and passes it to each
 * command.
 *
 * @module cli/session
 */

import { CatalogIOError, InvalidInputError } from '../core/errors';
import type { Logger } from '../core/logging/structuredLogger';
import type { Catalog, CatalogRepository } from '../features/catalog';
import { mathRandomSource, type RandomSource } from '../features/recommendations';
import { addItem } from './commands/addItem';
import { findOutfit } from './commands/findOutfit';
import type { CommandOutcome } from './commands/types';
import type { Prompter } from './prompter';

export const ACTION_PROMPT = 'Choose an action (find/add/quit): ';
export const INVALID_ACTION_MESSAGE = 'Invalid action. Please choose again.';

export type SessionAction = 'find' | 'add' | 'quit';

export interface SessionDeps {
  prompter: Prompter;
  repository: CatalogRepository;
  logger: Logger;
  random?: RandomSource;
}

export interface SessionResult {
  exitCode: number;
  /** Catalog as it stood when the session ended */
  catalog: Catalog;
}

/**
 * Maps a typed action keyword to an action, case-insensitively.
 */
export function parseAction(input: string): SessionAction | null {
  const action = input.trim().toLowerCase();
  return action === 'find' || action === 'add' || action === 'quit' ? action : null;
}

/**
 * Runs the interactive loop until `quit` or end of input.
 */
export async function runSession(initialCatalog: Catalog, deps: SessionDeps): Promise<SessionResult> {
  const { prompter, repository, logger } = deps;
  const random = deps.random ?? mathRandomSource;
  let catalog = initialCatalog;

  logger.info('session_started', { item_count: catalog.length });

  for (;;) {
    const answer = await prompter.ask(ACTION_PROMPT);
    if (answer === null) {
      break;
    }

    const action = parseAction(answer);
    if (action === 'quit') {
      break;
    }
    if (action === null) {
      prompter.print(INVALID_ACTION_MESSAGE);
      continue;
    }

    let outcome: CommandOutcome;
    try {
      outcome =
        action === 'find'
          ? await findOutfit(catalog, { prompter, logger, random })
          : await addItem(catalog, { prompter, repository });
    } catch (error) {
      if (error instanceof InvalidInputError) {
        logger.warn('invalid_input', { metadata: { action, field: error.field } });
        prompter.print(error.message);
        continue;
      }
      if (error instanceof CatalogIOError) {
        prompter.print(`Could not save item: ${error.message}`);
        continue;
      }
      throw error;
    }

    if (outcome.kind === 'end-of-input') {
      break;
    }
    catalog = outcome.catalog;
  }

  logger.info('session_ended', { item_count: catalog.length });
  return { exitCode: 0, catalog };
}
