import { spawn } from 'child_process';
import type { Recognizer } from '../types/engine.types.js';
import type { Logger } from '../utils/logger.js';

/** Characters of stderr kept in error messages */
const STDERR_TAIL = 400;

/**
 * Arguments for a stdin → stdout Tesseract run
 */
export function buildTesseractArgs(language: string): string[] {
    return ['stdin', 'stdout', '-l', language];
}

function tail(value: string, max: number): string {
    const trimmed = value.trim();
    return trimmed.length > max ? trimmed.slice(trimmed.length - max) : trimmed;
}

/**
 * Recognizer driving the Tesseract executable. The image is piped to
 * stdin and the text read from stdout; diagnostics on stderr are kept out
 * of the terminal and only surface in error messages and debug logs.
 */
export class TesseractRecognizer implements Recognizer {
    constructor(
        private readonly executable: string,
        private readonly logger: Logger
    ) { }

    recognize(image: Buffer, language: string): Promise<string> {
        return new Promise((resolve, reject) => {
            const stdout: Buffer[] = [];
            let stderr = '';
            let settled = false;

            const settle = (error: Error | null, text?: string): void => {
                if (settled) return;
                settled = true;
                if (error) {
                    reject(error);
                } else {
                    resolve(text ?? '');
                }
            };

            const proc = spawn(this.executable, buildTesseractArgs(language), {
                stdio: ['pipe', 'pipe', 'pipe'],
            });

            proc.stdout.on('data', (chunk: Buffer) => { stdout.push(chunk); });
            proc.stderr.on('data', (chunk: Buffer) => { stderr += chunk.toString(); });

            proc.on('error', (error) => {
                settle(new Error(`Could not start Tesseract at '${this.executable}': ${error.message}`));
            });

            proc.stdin.on('error', (error) => {
                settle(new Error(`Could not send image to Tesseract: ${error.message}`));
            });

            proc.on('close', (code) => {
                if (stderr) {
                    this.logger.debug('Tesseract diagnostics', { stderr: tail(stderr, STDERR_TAIL) });
                }
                if (code !== 0) {
                    const detail = tail(stderr, STDERR_TAIL);
                    settle(new Error(`Tesseract exited with code ${code ?? 'null'}${detail ? `: ${detail}` : ''}`));
                    return;
                }
                settle(null, Buffer.concat(stdout).toString('utf-8'));
            });

            proc.stdin.end(image);
        });
    }
}
