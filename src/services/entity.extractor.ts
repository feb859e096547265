import { z } from 'zod';
import type { EntityExtractor, EntitySpan } from '../types/engine.types.js';
import { ConfigurationError, wrapError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import { errnoCode } from '../utils/fs.js';

type Nlp = typeof import('compromise').default;

const peopleSchema = z.array(z.string());

/**
 * Locate each name in `text`, left to right. Names that cannot be found
 * verbatim (normalized by the tagger) get an empty span at the cursor.
 */
export function locateSpans(text: string, names: readonly string[]): EntitySpan[] {
    const spans: EntitySpan[] = [];
    let cursor = 0;

    for (const name of names) {
        const start = text.indexOf(name, cursor);
        if (start === -1) {
            spans.push({ name, span: { start: cursor, end: cursor } });
            continue;
        }
        const end = start + name.length;
        spans.push({ name, span: { start, end } });
        cursor = end;
    }

    return spans;
}

/**
 * Person-name extractor on top of compromise
 */
export class CompromiseEntityExtractor implements EntityExtractor {
    readonly id = 'compromise';

    constructor(private readonly nlp: Nlp) { }

    async extractPersonEntities(text: string): Promise<EntitySpan[]> {
        const people = peopleSchema.parse(this.nlp(text).people().out('array'));
        return locateSpans(text, people.map(name => name.replace(/[.,;:!?]+$/, '').trim()));
    }
}

/**
 * Load the optional compromise module. Resolves to null when it is not
 * installed, which turns the entity report into a skipped pass.
 */
export async function loadEntityExtractor(logger: Logger): Promise<EntityExtractor | null> {
    try {
        const loaded = await import('compromise');
        return new CompromiseEntityExtractor(loaded.default);
    } catch (error) {
        if (errnoCode(error) === 'ERR_MODULE_NOT_FOUND') {
            logger.info('compromise is not installed, entity report disabled');
            return null;
        }
        throw wrapError(error, ConfigurationError, 'loadEntityExtractor');
    }
}
