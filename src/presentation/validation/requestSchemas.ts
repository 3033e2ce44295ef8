import { z } from 'zod';
import { ART_STYLES, OUTPUT_FORMATS, TARGET_AUDIENCES } from '../../domain/entities/ComicJob';

export interface PageLimits {
    minTargetPages: number;
    maxTargetPages: number;
}

const DEFAULT_TARGET_PAGES = 20;

// Multipart forms send every field as a string, blank when left empty
function blankToUndefined(value: unknown): unknown {
    return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

function normalizeChoice(value: unknown): unknown {
    const present = blankToUndefined(value);
    return typeof present === 'string' ? present.trim().toLowerCase() : present;
}

/**
 * Turns numeric strings into numbers. Other values reach the schema untouched.
 */
export function parseNumberField(value: unknown): unknown {
    const present = blankToUndefined(value);
    return typeof present === 'string' ? Number(present.trim()) : present;
}

/**
 * Accepts an array, a JSON array string or a comma-separated string.
 */
export function parseFormatList(value: unknown): unknown {
    const present = blankToUndefined(value);
    if (Array.isArray(present)) {
        return present.map(normalizeChoice);
    }
    if (typeof present !== 'string') {
        return present;
    }

    const trimmed = present.trim();
    if (trimmed.startsWith('[')) {
        try {
            return parseFormatList(JSON.parse(trimmed));
        } catch {
            return trimmed;
        }
    }
    return trimmed
        .split(',')
        .map((item) => item.trim().toLowerCase())
        .filter((item) => item.length > 0);
}

/**
 * Body of POST /api/v1/generate. Page bounds come from configuration.
 */
export function createGenerateRequestSchema(limits: PageLimits) {
    const defaultPages = Math.min(Math.max(DEFAULT_TARGET_PAGES, limits.minTargetPages), limits.maxTargetPages);

    return z.object({
        text: z.preprocess(blankToUndefined, z.string().optional()),
        title: z.preprocess(blankToUndefined, z.string().trim().max(200).default('Untitled Comic')),
        art_style: z.preprocess(normalizeChoice, z.enum(ART_STYLES).default('cartoon')),
        target_pages: z.preprocess(
            parseNumberField,
            z
                .number()
                .int()
                .min(limits.minTargetPages)
                .max(limits.maxTargetPages)
                .default(defaultPages)
        ),
        target_audience: z.preprocess(normalizeChoice, z.enum(TARGET_AUDIENCES).default('general')),
        target_language: z.preprocess(normalizeChoice, z.string().min(2).max(16).default('en')),
        output_formats: z.preprocess(parseFormatList, z.array(z.enum(OUTPUT_FORMATS)).min(1).default(['pdf'])),
    });
}

export type GenerateRequest = z.infer<ReturnType<typeof createGenerateRequestSchema>>;

export const StoryRequestSchema = z.object({
    prompt: z.string().trim().min(1),
    genre: z.string().trim().min(1).default('Fantasy'),
    themes: z.array(z.string().trim().min(1)).default([]),
    num_chapters: z.number().int().min(1).max(20).default(5),
});

export const CaptionRequestSchema = z.object({
    panel_description: z.string().trim().min(1),
    context: z.string().default(''),
    max_words: z.number().int().min(1).max(100).default(20),
});

export const DialogueRequestSchema = z.object({
    characters: z.array(z.string().trim().min(1)).min(1),
    scene_description: z.string().trim().min(1),
    context: z.string().default(''),
    num_exchanges: z.number().int().min(1).max(20).default(3),
});

/**
 * One line per issue, prefixed with the offending field.
 */
export function formatValidationError(error: z.ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}
