/**
 * @file Settings File Schema
 *
 * Zod schema for `config/returns.yaml`. Every key is optional; anything
 * omitted falls back to the built-in defaults.
 *
 * Usage:
 *   const result = SettingsFileSchema.safeParse(yaml.load(raw));
 *   if (!result.success) { ... report issues ... }
 *
 * @module config/schemas
 */

import { z } from 'zod';

const CategorySchema = z.object({
    title:  z.string().min(1),
    fields: z.array(z.string())
});

export const SettingsFileSchema = z.object({
    source: z.object({
        url:  z.string().nullable(),
        file: z.string().nullable()
    }).partial(),
    transport: z.object({
        timeoutMs:       z.number().int(),
        minBytes:        z.number().int(),
        cacheTtlSeconds: z.number().int(),
        cacheBust:       z.boolean()
    }).partial(),
    dataset: z.object({
        identifierColumn: z.string().min(1),
        excludeColumns:   z.array(z.string()),
        sampleSize:       z.number().int()
    }).partial(),
    lookup: z.object({
        minLength: z.number().int()
    }).partial(),
    log: z.object({
        file: z.string().nullable()
    }).partial(),
    presentation: z.object({
        statusField:       z.string(),
        trackingLinkField: z.string(),
        catchAllTitle:     z.string().min(1),
        categories:        z.array(CategorySchema),
        labels:            z.record(z.string()),
        moneyKeywords:     z.array(z.string()),
        dateKeywords:      z.array(z.string())
    }).partial()
}).partial().strict();

export type SettingsFile = z.infer<typeof SettingsFileSchema>;

/**
 * Render zod issues as `path: message` lines.
 */
export function schemaIssues_format(error: z.ZodError): string[] {
    return error.issues.map((issue: z.ZodIssue): string => {
        const where: string = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${where}: ${issue.message}`;
    });
}
