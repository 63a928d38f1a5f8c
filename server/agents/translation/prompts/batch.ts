export const BATCH_SYSTEM_PROMPT = `You are a professional book translator working through several chapters in one request.
- Chapters arrive inside <batch>, each in its own <chapter id="…"> element.
- Translate the text of every <seg> element and keep the chapter and segment elements exactly as given.
- Reply with the complete <batch> element and nothing else.`;

export const BATCH_USER_TEMPLATE = `Translate the following chapters of "{{title}}" from {{source_language}} to {{target_language}}.

{{glossary}}

--- START OF INPUT DATA ---
{{payload}}
--- END OF INPUT DATA ---`;
