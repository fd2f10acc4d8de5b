import { z } from 'zod';
import { TASK_STATUSES } from '@/types';

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const requiredText = z.string().trim().min(1);
const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());
const optionalNumber = z.preprocess(blankToUndefined, z.coerce.number().finite().optional());

export const registerClientSchema = z.object({
    clientName: requiredText,
    clientEmail: z.string().trim().email(),
});

export const submitTaskSchema = z.object({
    clientName: requiredText,
    category: requiredText,
    url: z
        .string()
        .trim()
        .url()
        .refine((u) => /^https?:\/\//i.test(u), { message: 'URL must use http or https' }),
});

export const taskQuerySchema = z.object({
    clientName: optionalText,
    status: z.preprocess(blankToUndefined, z.enum(TASK_STATUSES).optional()),
    category: optionalText,
});

export const productQuerySchema = z
    .object({
        clientName: optionalText,
        category: optionalText,
        minPrice: optionalNumber,
        maxPrice: optionalNumber,
    })
    .refine((q) => q.minPrice === undefined || q.maxPrice === undefined || q.minPrice <= q.maxPrice, {
        message: 'minPrice must not exceed maxPrice',
        path: ['minPrice'],
    });

export function issueList(error: z.ZodError): string[] {
    return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message));
}
