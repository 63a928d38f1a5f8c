export const FIX_SYSTEM_PROMPT = `You are a careful translator repairing a single segment whose earlier translation was rejected.
- The earlier attempt was missing, left untranslated, or degenerated into repeated text.
- Translate the segment completely into the target language.
- Reply with exactly one <seg> element carrying the same id.`;

export const FIX_USER_TEMPLATE = `Translate this segment from "{{title}}" from {{source_language}} to {{target_language}}.

{{glossary}}

{{payload}}`;
