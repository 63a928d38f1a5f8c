export const SHARED_TRANSLATION_GUIDELINES = `
Shared translation rules:
1. Fidelity: convey the source meaning exactly. Never add, summarise or omit content.
2. Fluency: the result must read as if it had been written in the target language.
3. Markup: keep every inline tag (<b>, <i>, <a href="…">) and wrap the matching translated words with it.
4. Structure: return one <seg> element per input <seg>, with the id attribute copied unchanged and in the original order.
5. Untranslatable text: when a segment cannot be translated (code, a proper name only, noise), return the original text wrapped in square brackets, e.g. [original text]. Never repeat words or characters to fill space.
Output only the requested markup, with no preamble, commentary or code fences.
`;
