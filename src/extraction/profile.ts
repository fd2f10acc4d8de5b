import { readFile } from 'node:fs/promises';
import { z } from 'zod';

const strategySchema = z.object({
    selector: z.string().min(1),
    /** Read this attribute instead of the element's text. */
    attribute: z.string().min(1).optional(),
});

const chainSchema = z.object({
    strategies: z.array(strategySchema).min(1),
    timeoutMs: z.number().int().nonnegative(),
});

export const selectorProfileSchema = z.object({
    title: chainSchema,
    price: chainSchema,
    gallery: z.object({
        container: z.string().min(1),
        thumbnails: z.string().min(1),
        mainImage: z.string().min(1),
        limit: z.number().int().positive(),
        timeoutMs: z.number().int().nonnegative(),
    }),
    colors: z.object({
        groups: z.array(z.string().min(1)),
        imageAltFallback: z.string().min(1),
    }),
    sizes: z.object({
        groups: z.array(z.string().min(1)),
        placeholder: z.string(),
    }),
    about: z.object({
        container: z.string().min(1),
        item: z.string().min(1),
        scrollTimeoutMs: z.number().int().nonnegative(),
        timeoutMs: z.number().int().nonnegative(),
    }),
    relatedLinks: z.object({
        anchor: z.string().min(1),
    }),
    challengeMarkers: z.array(z.string().min(1)),
});

export type SelectorStrategy = z.infer<typeof strategySchema>;
export type FieldChain = z.infer<typeof chainSchema>;
export type SelectorProfile = z.infer<typeof selectorProfileSchema>;

/** Reads and validates a JSON selector profile. */
export async function loadSelectorProfile(filePath: string): Promise<SelectorProfile> {
    const raw: unknown = JSON.parse(await readFile(filePath, 'utf-8'));
    const parsed = selectorProfileSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new Error(`Invalid selector profile ${filePath}: ${issues}`);
    }
    return parsed.data;
}
