import { z } from 'zod';

export const configSchema = z.object({
    outputSuffix: z.string().min(1, 'output suffix must not be empty'),
    header: z.string(),
    startOffset: z.number().int().nonnegative(),
    maxInstructions: z.number().int().positive().nullable(),
    listing: z.boolean(),
    stdout: z.boolean(),
    signedDisplacements: z.boolean(),
    verbose: z.boolean()
}).strict();

export type DisassemblerConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG: DisassemblerConfig = {
    outputSuffix: '-out-gen.asm',
    header: 'bits 16',
    startOffset: 0,
    maxInstructions: null,
    listing: false,
    stdout: false,
    signedDisplacements: true,
    verbose: false
};

/**
 * Merge overrides onto the defaults and validate the result
 */
export const resolveConfig = (overrides: Partial<DisassemblerConfig> = {}): DisassemblerConfig => {
    const result = configSchema.safeParse({ ...DEFAULT_CONFIG, ...overrides });

    if (!result.success) {
        const details = result.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid configuration: ${details}`);
    }

    return result.data;
};
