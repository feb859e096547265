import { z } from 'zod';
import { rangeModeSchema, type RangeMode } from '../types/config.types.js';
import { ValidationError } from '../errors/index.js';

/**
 * Raw `run` options as commander hands them over
 */
export const runOptionsSchema = z.object({
    outputDir: z.string().default('.'),
    dpi: z.coerce.number().int().optional(),
    lang: z.string().optional(),
    tesseractPath: z.string().optional(),
    concurrency: z.coerce.number().int().optional(),
    mode: z.enum(['all', 'range', 'resume']).optional(),
    range: z.string().optional(),
    entities: z.boolean().default(true),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    pretty: z.boolean().default(false),
});

export type RunOptions = z.infer<typeof runOptionsSchema>;

export const inspectOptionsSchema = z.object({
    outputDir: z.string().default('.'),
});

/**
 * Validate command options, reporting every issue at once
 */
export function parseOptions<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options: unknown): T {
    const result = schema.safeParse(options);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ValidationError(`Invalid options: ${issues}`);
    }
    return result.data;
}

/**
 * Combine `--mode` and `--range` into a RangeMode. A range given without
 * a mode implies range mode.
 */
export function parseRangeMode(mode: RunOptions['mode'], range: string | undefined): RangeMode {
    const effective = mode ?? (range ? 'range' : 'all');

    if (effective !== 'range') {
        return { mode: effective };
    }

    const match = range ? /^\s*(\d+)\s*-\s*(\d+)\s*$/.exec(range) : null;
    const start = match?.[1];
    const end = match?.[2];
    if (start === undefined || end === undefined) {
        throw new ValidationError(
            `Invalid range '${range ?? ''}'. Expected start-end, e.g. 3-10.`,
            'range'
        );
    }

    return parseOptions(rangeModeSchema, { mode: 'range', start: Number(start), end: Number(end) });
}
