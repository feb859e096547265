import * as path from 'path';
import type { PipelineConfig, ResolvedConfig } from '../types/config.types.js';
import {
    pipelineConfigSchema,
    DEFAULT_LOG_CONFIG,
    DEFAULT_RENDER_CONFIG,
    DEFAULT_TESSERACT_PATH,
    defaultConcurrency,
} from '../types/config.types.js';
import { ConfigurationError } from '../errors/index.js';

/**
 * Validate user config and apply defaults. The result is frozen and shared
 * by every component of a run.
 */
export function resolveConfig(userConfig: PipelineConfig = {}): ResolvedConfig {
    const validation = pipelineConfigSchema.safeParse(userConfig);
    if (!validation.success) {
        throw new ConfigurationError('Invalid configuration', {
            errors: validation.error.issues.map(issue => ({
                path: issue.path.join('.'),
                message: issue.message,
            })),
        });
    }

    return Object.freeze({
        outputRoot: path.resolve(userConfig.outputRoot ?? '.'),
        render: Object.freeze({
            dpi: userConfig.render?.dpi ?? DEFAULT_RENDER_CONFIG.dpi,
            language: userConfig.render?.language ?? DEFAULT_RENDER_CONFIG.language,
        }),
        concurrency: userConfig.concurrency ?? defaultConcurrency(),
        tesseractPath: userConfig.tesseractPath ?? DEFAULT_TESSERACT_PATH,
        entities: userConfig.entities ?? true,
        logging: Object.freeze({
            level: userConfig.logging?.level ?? DEFAULT_LOG_CONFIG.level,
            structured: userConfig.logging?.structured ?? DEFAULT_LOG_CONFIG.structured,
            customLogger: userConfig.logging?.customLogger,
        }),
    });
}
