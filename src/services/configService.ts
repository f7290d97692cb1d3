import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { AppConfig } from '../types/config';
import type { CompletionPolicy } from '../types/completion';
import type { SubtitleLayout } from '../types/subtitle';
import { DEFAULT_CONFIG } from '../stores/configStore';

const LAYOUTS: readonly SubtitleLayout[] = ['translation-above', 'original-above', 'translation-only', 'original-only'];

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: Record<string, unknown>, key: keyof AppConfig, fallback: string): string {
    const value = source[key];
    return typeof value === 'string' ? value : fallback;
}

function readBoolean(source: Record<string, unknown>, key: keyof AppConfig, fallback: boolean): boolean {
    const value = source[key];
    return typeof value === 'boolean' ? value : fallback;
}

function readPositiveInt(source: Record<string, unknown>, key: keyof AppConfig, fallback: number): number {
    const value = source[key];
    return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : fallback;
}

function readLayout(value: unknown): SubtitleLayout {
    return LAYOUTS.find((layout) => layout === value) ?? DEFAULT_CONFIG.subtitleLayout;
}

function readCompletionPolicy(value: unknown): CompletionPolicy {
    if (!isRecord(value)) return DEFAULT_CONFIG.completionPolicy;
    switch (value.type) {
        case 'none':
            return { type: 'none' };
        case 'exit':
            return { type: 'exit', exitCode: typeof value.exitCode === 'number' ? value.exitCode : 0 };
        case 'suspend':
            return { type: 'suspend' };
        case 'shutdown':
            return { type: 'shutdown' };
        default:
            return DEFAULT_CONFIG.completionPolicy;
    }
}

/**
 * Builds a complete configuration from untrusted JSON.
 * Missing or mistyped fields take their default value.
 */
export function parseConfig(raw: unknown): AppConfig {
    if (!isRecord(raw)) return { ...DEFAULT_CONFIG };
    const d = DEFAULT_CONFIG;

    return {
        transcriberCommand: readString(raw, 'transcriberCommand', d.transcriberCommand),
        optimizerCommand: readString(raw, 'optimizerCommand', d.optimizerCommand),
        generatorCommand: readString(raw, 'generatorCommand', d.generatorCommand),
        targetLanguage: readString(raw, 'targetLanguage', d.targetLanguage),
        needOptimize: readBoolean(raw, 'needOptimize', d.needOptimize),
        needTranslate: readBoolean(raw, 'needTranslate', d.needTranslate),
        needSplit: readBoolean(raw, 'needSplit', d.needSplit),
        batchSize: readPositiveInt(raw, 'batchSize', d.batchSize),
        threadNum: readPositiveInt(raw, 'threadNum', d.threadNum),
        customPrompt: readString(raw, 'customPrompt', d.customPrompt),
        llmModel: readString(raw, 'llmModel', d.llmModel),
        maxWordCountCjk: readPositiveInt(raw, 'maxWordCountCjk', d.maxWordCountCjk),
        maxWordCountEnglish: readPositiveInt(raw, 'maxWordCountEnglish', d.maxWordCountEnglish),
        subtitleLayout: readLayout(raw.subtitleLayout),
        assStyle: readString(raw, 'assStyle', d.assStyle),
        completionPolicy: readCompletionPolicy(raw.completionPolicy),
        countdownSeconds: readPositiveInt(raw, 'countdownSeconds', d.countdownSeconds),
    };
}

export const configService = {
    /**
     * Reads the configuration file. A missing file yields the defaults.
     *
     * @param filePath Path of the JSON settings file.
     * @throws {Error} If the file exists but is not valid JSON.
     */
    async load(filePath: string): Promise<AppConfig> {
        let content: string;
        try {
            content = await readFile(filePath, 'utf-8');
        } catch (e) {
            if (isRecord(e) && e.code === 'ENOENT') {
                console.log('[Config] No settings file, using defaults:', filePath);
                return { ...DEFAULT_CONFIG };
            }
            throw e;
        }

        try {
            return parseConfig(JSON.parse(content));
        } catch (e) {
            console.error('[Config] Failed to parse settings file:', e);
            throw new Error(`Invalid settings file ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
        }
    },

    /**
     * Writes the configuration file, creating its directory if needed.
     */
    async save(filePath: string, config: AppConfig): Promise<void> {
        await mkdir(path.dirname(filePath), { recursive: true });
        await writeFile(filePath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
        console.log('[Config] Saved settings to', filePath);
    },
};
