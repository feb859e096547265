import { availableParallelism } from 'os';
import { z } from 'zod';

/**
 * Logging configuration
 */
export interface LogConfig {
    /** Log level */
    level: 'debug' | 'info' | 'warn' | 'error';
    /** Enable structured JSON logging (default: true) */
    structured: boolean;
    /** Custom logger function */
    customLogger?: (level: string, message: string, meta?: Record<string, unknown>) => void;
}

/**
 * Page selection applied before scheduling
 */
export type RangeMode =
    | { mode: 'all' }
    | { mode: 'range'; start: number; end: number }
    | { mode: 'resume' };

/**
 * Rendering and recognition settings shared by every page of a run
 */
export interface RenderConfig {
    /** Rasterization resolution in dots per inch (default: 300) */
    dpi: number;
    /** Tesseract language hint, `+` joined (default: 'eng') */
    language: string;
}

/**
 * Main pipeline configuration (user-facing, everything optional)
 */
export interface PipelineConfig {
    /** Base directory under which `<name>_processed` folders are created (default: '.') */
    outputRoot?: string;
    /** Render settings */
    render?: Partial<RenderConfig>;
    /** Worker pool size (default: available parallelism) */
    concurrency?: number;
    /** Path to the Tesseract executable (default: 'tesseract') */
    tesseractPath?: string;
    /** Run the person-entity report when an extractor is available (default: true) */
    entities?: boolean;
    /** Logging configuration */
    logging?: Partial<LogConfig>;
}

/**
 * Internal resolved configuration with all defaults applied.
 * Frozen once built and passed to every component constructor.
 */
export interface ResolvedConfig {
    readonly outputRoot: string;
    readonly render: Readonly<RenderConfig>;
    readonly concurrency: number;
    readonly tesseractPath: string;
    readonly entities: boolean;
    readonly logging: Readonly<LogConfig>;
}

/**
 * Default configuration values
 */
export const DEFAULT_RENDER_CONFIG: RenderConfig = {
    dpi: 300,
    language: 'eng',
};

export const DEFAULT_LOG_CONFIG: LogConfig = {
    level: 'info',
    structured: true,
};

export const DEFAULT_TESSERACT_PATH = 'tesseract';

export function defaultConcurrency(): number {
    return Math.max(1, availableParallelism());
}

/**
 * Zod schema for range selection
 */
export const rangeModeSchema = z.discriminatedUnion('mode', [
    z.object({ mode: z.literal('all') }),
    z.object({
        mode: z.literal('range'),
        start: z.number().int().min(1),
        end: z.number().int().min(1),
    }),
    z.object({ mode: z.literal('resume') }),
]).superRefine((value, ctx) => {
    if (value.mode === 'range' && value.start > value.end) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: 'Range start must not exceed range end',
            path: ['start'],
        });
    }
});

/**
 * Zod schema for config validation
 */
export const pipelineConfigSchema = z.object({
    outputRoot: z.string().min(1).optional(),
    render: z
        .object({
            dpi: z.number().int().min(36).max(1200).optional(),
            language: z
                .string()
                .regex(/^[A-Za-z_]+(\+[A-Za-z_]+)*$/, 'Languages must be `+` joined Tesseract codes')
                .optional(),
        })
        .optional(),
    concurrency: z.number().int().min(1).max(256).optional(),
    tesseractPath: z.string().min(1).optional(),
    entities: z.boolean().optional(),
    logging: z
        .object({
            level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
            structured: z.boolean().optional(),
        })
        .optional(),
});
