/**
 * Builder constructor options. Only what the caller passes is used; there is
 * no environment fallback, so a builder's defaults never depend on the host.
 */
import { z } from 'zod';
import { RequestBuilderConfigError } from './errors.js';

export const DEFAULT_TIMEOUT_SECONDS = 30;

export const BuilderConfigSchema = z.object({
    baseUrl: z.string().optional(),
    // Same contract as setTimeout: any number passes through to the transport
    timeoutSeconds: z.union([z.number(), z.nan()]).default(DEFAULT_TIMEOUT_SECONDS),
    headers: z.record(z.string()).default(() => ({})),
});

export type BuilderConfigOptions = z.input<typeof BuilderConfigSchema>;
export type BuilderConfig = z.infer<typeof BuilderConfigSchema>;

export function parseBuilderConfig(config: unknown): BuilderConfig {
    const parsed = BuilderConfigSchema.safeParse(config);
    if (!parsed.success) {
        throw new RequestBuilderConfigError(`Invalid config: ${parsed.error.message}`);
    }
    return parsed.data;
}

export function resolveBuilderConfig(options: BuilderConfigOptions = {}): BuilderConfig {
    return parseBuilderConfig(options);
}
