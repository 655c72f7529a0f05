/**
 * Text Detection Tools
 * Offline address recognition; these never call the service
 */

import { z } from 'zod';
import {
  didYouMean,
  findPossibleAddresses,
  isPossibleAddress,
} from '../recognizer/recognizer.js';
import { defineTool } from './define-tool.js';

export const textSchema = z.object({
  text: z.string(),
});

const textInputSchema = {
  type: 'object',
  properties: {
    text: { type: 'string', description: 'Free-form text to inspect' },
  },
  required: ['text'],
};

export const findPossible3waTool = defineTool(
  {
    name: 'find_possible_3wa',
    description:
      'List every substring of the text shaped like a three-word address (word.word.word). Does not check that the addresses exist.',
    inputSchema: textInputSchema,
  },
  textSchema,
  async ({ text }) => {
    const addresses = findPossibleAddresses(text);
    return { addresses, count: addresses.length };
  }
);

export const isPossible3waTool = defineTool(
  {
    name: 'is_possible_3wa',
    description: 'Check whether the whole text is shaped like a three-word address.',
    inputSchema: textInputSchema,
  },
  textSchema,
  async ({ text }) => ({ possible: isPossibleAddress(text) })
);

export const didYouMeanTool = defineTool(
  {
    name: 'did_you_mean',
    description:
      'Check whether the text looks like a three-word address typed with spaces, hyphens or similar instead of dots.',
    inputSchema: textInputSchema,
  },
  textSchema,
  async ({ text }) => ({ didYouMean: didYouMean(text) })
);
