import { z } from 'zod';

/**
 * Shapes the story, script and text stages accept from the model.
 */

const nonEmpty = z.string().trim().min(1);

export const StorySchema = z.object({
    title: nonEmpty,
    summary: nonEmpty,
    genre: z.string().trim().default('drama'),
    themes: z.array(z.string()).default([]),
    characters: z
        .array(
            z.object({
                name: nonEmpty,
                description: z.string().default(''),
                role: z.string().default('supporting'),
            })
        )
        .default([]),
    scenes: z
        .array(
            z.object({
                sceneNumber: z.number().int().positive().optional(),
                setting: z.string().default(''),
                summary: nonEmpty,
            })
        )
        .min(1),
});

export const ScriptSchema = z.object({
    title: z.string().trim().optional(),
    colorPalette: z.array(z.string()).default([]),
    panels: z
        .array(
            z.object({
                panelNumber: z.number().int().optional(),
                description: nonEmpty,
                mood: z.string().trim().min(1).default('neutral'),
                cameraAngle: z.string().trim().min(1).default('medium shot'),
                characters: z.array(z.string()).default([]),
            })
        )
        .min(1),
});

export const PanelTextSchema = z.object({
    panels: z.array(
        z.object({
            panelNumber: z.number().int(),
            caption: z.string().nullable().optional(),
            dialogue: z
                .array(
                    z.object({
                        character: nonEmpty,
                        text: nonEmpty,
                    })
                )
                .default([]),
            soundEffects: z.array(z.string()).default([]),
        })
    ),
});

export type ParsedStory = z.infer<typeof StorySchema>;
export type ParsedScript = z.infer<typeof ScriptSchema>;
export type ParsedPanelText = z.infer<typeof PanelTextSchema>;
