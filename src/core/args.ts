/**
 * CORE: Argument parsing
 * Bridges zod schemas into the ParseCommandError channel used by parsers and prompts.
 */

import type { output, ZodTypeAny } from 'zod';
import { ParseCommandError } from './errors';

/**
 * Runs `schema` over `text`. Validation issues are joined into a single
 * ParseCommandError message, e.g. "invalid float literal".
 */
export function parseArgs<S extends ZodTypeAny>(schema: S, text: string): output<S> {
    const result = schema.safeParse(text);
    if (!result.success) {
        throw new ParseCommandError(result.error.issues.map((issue) => issue.message).join('; '));
    }
    return result.data;
}
