import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';
import { DEFAULT_PROMPTS, type Prompts } from './looper';

export const CONFIG_FILES = ['cmdloop.config.jsonc', 'cmdloop.config.json'] as const;

const PromptsSchema = z
    .object({
        applied: z.string().min(1).describe('Prompt after a command was applied.'),
        skipped: z.string().min(1).describe('Prompt after a command was skipped.'),
        erred: z.string().min(1).describe('Prompt after a command failed with an application error.'),
    })
    .partial()
    .default({})
    .transform((prompts): Prompts => ({ ...DEFAULT_PROMPTS, ...prompts }))
    .refine((prompts) => new Set(Object.values(prompts)).size === 3, {
        message: 'must be pairwise distinct',
    });

export const ConfigSchema = z.object({
    prompts: PromptsSchema,
    banner: z.string().optional().describe('Printed once before the loop starts.'),
    helpTemplate: z.string().optional().describe('Nunjucks template for the help table, relative to the config file.'),
});

export interface ReplConfig {
    prompts: Prompts;
    banner?: string;
    /** Absolute path, when configured. */
    helpTemplate?: string;
}

export const DEFAULT_CONFIG: ReplConfig = {
    prompts: DEFAULT_PROMPTS,
};

export class ConfigLoader {
    private configPath: string | null;
    private workDir: string;

    constructor(workDir: string) {
        this.workDir = workDir;
        const found = CONFIG_FILES.map((name) => path.join(workDir, name)).find((candidate) =>
            fs.existsSync(candidate)
        );
        this.configPath = found ?? null;
    }

    /**
     * Path of the config file in use, or null when running on defaults.
     */
    get path(): string | null {
        return this.configPath;
    }

    /**
     * Loads and validates the config. A missing file is not an error.
     * @throws ConfigError on invalid JSON or schema violations
     */
    async load(): Promise<ReplConfig> {
        if (this.configPath === null) {
            return DEFAULT_CONFIG;
        }

        const content = this.stripJsonComments(await fs.readFile(this.configPath, 'utf-8'));
        const file = path.basename(this.configPath);

        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (e) {
            throw new ConfigError(`Invalid config JSON in ${file}: ${e instanceof Error ? e.message : String(e)}`);
        }

        const result = ConfigSchema.safeParse(raw);
        if (!result.success) {
            const problems = result.error.issues.map((issue) =>
                issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
            );
            throw new ConfigError(`Invalid config in ${file}: ${problems.join('; ')}`);
        }

        const { prompts, banner } = result.data;
        let helpTemplate: string | undefined;
        if (result.data.helpTemplate !== undefined) {
            helpTemplate = path.resolve(this.workDir, result.data.helpTemplate);
            if (!(await fs.pathExists(helpTemplate))) {
                throw new ConfigError(`Help template not found: ${helpTemplate} (helpTemplate in ${file})`);
            }
        }
        return { prompts, banner, helpTemplate };
    }

    /**
     * Drops whole-line `//` comments. String values are never touched.
     */
    private stripJsonComments(content: string): string {
        return content.replace(/^\s*\/\/.*$/gm, '');
    }
}
