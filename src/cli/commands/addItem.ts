/**
 * The `add` command: asks for a new item's fields and appends it.
 *
 * The item joins the in-memory catalog only after it has been persisted.
 * Nothing is written when any answer is rejected.
 *
 * @module cli/commands/addItem
 */

import {
  appendToCatalog,
  parseItemInput,
  type Catalog,
  type CatalogRepository,
  type RawItemFields,
} from '../../features/catalog';
import type { Prompter } from '../prompter';
import type { CommandOutcome } from './types';

/**
 * Prompts in the order they are asked.
 */
export const ADD_PROMPTS: ReadonlyArray<readonly [keyof RawItemFields, string]> = [
  ['category', 'Enter the category of the item (jacket/shirt/pants/shoes): '],
  ['name', 'Enter the name of the item: '],
  ['color', 'Enter the color of the item: '],
  ['temperature', 'Enter the temperature category of the item (cold/medium/hot): '],
  ['weather', 'Is this item for rainy or sunny weather (rainy/sunny)? '],
  ['style', 'Enter the style category of the item (casual/formal): '],
];

export const ITEM_ADDED_MESSAGE = 'Item added successfully.';

export interface AddItemDeps {
  prompter: Prompter;
  repository: CatalogRepository;
}

/**
 * Runs the `add` dialogue.
 *
 * @throws {InvalidInputError} If an answer is rejected
 * @throws {CatalogIOError} If the record cannot be written
 */
export async function addItem(catalog: Catalog, deps: AddItemDeps): Promise<CommandOutcome> {
  const { prompter, repository } = deps;
  const fields: RawItemFields = {
    category: '',
    name: '',
    color: '',
    temperature: '',
    style: '',
    weather: '',
  };

  for (const [field, question] of ADD_PROMPTS) {
    const answer = await prompter.ask(question);
    if (answer === null) {
      return { kind: 'end-of-input' };
    }
    fields[field] = answer;
  }

  const item = parseItemInput(fields);
  await repository.append(item);
  prompter.print(ITEM_ADDED_MESSAGE);

  return { kind: 'continue', catalog: appendToCatalog(catalog, item) };
}
