import type { Catalog } from '../../features/catalog';

/**
 * What the session does after a command.
 *
 * - continue: prompt for the next action with the (possibly grown) catalog
 * - end-of-input: input ended mid-dialogue; the session stops
 */
export type CommandOutcome =
  | { kind: 'continue'; catalog: Catalog }
  | { kind: 'end-of-input' };
