import { ArtStyle, TargetAudience } from '../../domain/entities/ComicJob';
import { ScriptPanel, StoryCharacter } from '../../domain/entities/StageResult';

/**
 * Fixed style descriptors appended to every panel image prompt.
 */
export const ART_STYLE_DESCRIPTORS: Readonly<Record<ArtStyle, string>> = {
    cartoon: 'bold cartoon style, clean outlines, flat saturated colors, expressive characters',
    manga: 'black and white manga style, screentone shading, dynamic speed lines, detailed ink work',
    realistic: 'realistic graphic novel style, detailed rendering, natural lighting, painterly textures',
    noir: 'film noir comic style, high contrast black and white, heavy shadows, dramatic lighting',
    watercolor: 'watercolor illustration, soft washes, gentle color bleeding, textured paper',
    superhero: 'classic superhero comic style, dynamic poses, vibrant primary colors, halftone dots',
};

const AUDIENCE_NOTES: Readonly<Record<TargetAudience, string>> = {
    children: 'Readers are children: simple words, gentle conflict, no frightening or violent content.',
    teen: 'Readers are teenagers: energetic pacing, relatable stakes, no graphic content.',
    general: 'Readers are a general audience: clear storytelling suitable for all ages.',
    adult: 'Readers are adults: nuanced themes and mature tone are welcome.',
};

export const COMIC_WRITER_SYSTEM_PROMPT = `You are a professional comic book writer and editor.
You adapt source material into tightly paced visual stories told through panels.
Always answer with a single JSON object and nothing else.`;

export const STORY_PROMPT = `Adapt the source material below into a comic book story.

TITLE: "{{title}}"
TARGET PAGES: {{targetPages}}
LANGUAGE: {{language}}
{{audienceNote}}

SOURCE:
"""
{{content}}
"""

Respond with a JSON object:
{
  "title": "comic title",
  "summary": "two or three sentence synopsis",
  "genre": "genre",
  "themes": ["theme"],
  "characters": [{ "name": "name", "description": "visual description", "role": "protagonist | antagonist | supporting" }],
  "scenes": [{ "sceneNumber": 1, "setting": "where and when", "summary": "what happens" }]
}`;

export const SCRIPT_PROMPT = `Break this comic story into exactly {{panelCount}} panels across {{targetPages}} page(s).

STORY:
{{story}}

ART STYLE: {{artStyle}}
{{audienceNote}}

Number panels from 1 to {{panelCount}} in reading order. Each description must be a self-contained visual brief an illustrator can draw without other context.

Respond with a JSON object:
{
  "title": "comic title",
  "colorPalette": ["dominant color"],
  "panels": [{ "panelNumber": 1, "description": "what the panel shows", "mood": "emotional tone", "cameraAngle": "wide shot | medium shot | close-up | bird's eye | low angle", "characters": ["name"] }]
}`;

export const PANEL_TEXT_PROMPT = `Write the lettering for these comic panels in {{language}}.

CHARACTERS:
{{characters}}

PANELS:
{{panels}}

Rules:
- Captions are narration, at most {{captionMaxWords}} words, and may be omitted.
- Dialogue lines are short and attributed to a named character.
- Sound effects are optional onomatopoeia.
- Return exactly one entry for each panel number listed above.

Respond with a JSON object:
{
  "panels": [{ "panelNumber": 1, "caption": "narration or null", "dialogue": [{ "character": "name", "text": "line" }], "soundEffects": ["BOOM"] }]
}`;

export const STORY_DRAFT_PROMPT = `Write a {{genre}} story for a comic based on: "{{prompt}}".
Themes: {{themes}}
Split it into exactly {{chapterCount}} chapters.

Respond with a JSON object:
{ "title": "title", "chapters": [{ "title": "chapter title", "content": "chapter text" }] }`;

export const CAPTION_PROMPT = `Write one comic book caption for this panel, at most {{maxWords}} words.

PANEL: {{description}}
CONTEXT: {{context}}

Respond with a JSON object: { "caption": "text" }`;

export const DIALOGUE_PROMPT = `Write {{exchanges}} exchanges of comic dialogue between {{characters}} for this scene.

SCENE: {{description}}
CONTEXT: {{context}}

Keep each line short enough for a speech bubble.

Respond with a JSON object: { "dialogue": [{ "character": "name", "text": "line" }] }`;

/**
 * Replaces {{key}} placeholders with the given values.
 */
export function fillTemplate(template: string, values: Record<string, string | number>): string {
    return template.replace(/{{(\w+)}}/g, (match, key: string) =>
        key in values ? String(values[key]) : match
    );
}

export function audienceNote(audience: TargetAudience): string {
    return AUDIENCE_NOTES[audience];
}

/**
 * Image prompt for one panel.
 */
export function buildPanelImagePrompt(
    panel: ScriptPanel,
    artStyle: ArtStyle,
    characters: StoryCharacter[],
    colorPalette: string[]
): string {
    const cast = characters
        .filter((character) => panel.characters.includes(character.name))
        .map((character) => `${character.name}: ${character.description}`);

    const parts = [
        `Comic panel, ${panel.cameraAngle}: ${panel.description}`,
        `Mood: ${panel.mood}`,
        ...(cast.length > 0 ? [`Characters: ${cast.join('; ')}`] : []),
        ...(colorPalette.length > 0 ? [`Palette: ${colorPalette.join(', ')}`] : []),
        ART_STYLE_DESCRIPTORS[artStyle],
        'no text, no speech bubbles',
    ];
    return parts.join('. ');
}

/**
 * Motion prompt for animating one panel.
 */
export function buildPanelMotionPrompt(panel: ScriptPanel): string {
    return `Subtle cinematic motion. ${panel.description}. Mood: ${panel.mood}. Smooth camera movement, consistent characters.`;
}
