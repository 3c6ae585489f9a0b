/**
 * Default prompts for distillation and fact extraction
 */

export const DISTILLATION_PROMPT =
  'You are given a chunk of text delimited by ```. Respond with a concise heading, a summary and a bulleted list of the facts it states. Ignore names of people, references and citations.';

export function distillationUserPrompt(text: string): string {
  return `Rewrite this in a matter-of-fact voice so that it stands on its own and keeps every detail: \`\`\`${text}\`\`\``;
}

export const EXTRACTION_PROMPT = `You extract subject-relation-object facts from a chunk of text delimited by \`\`\`.

For each sentence:
- identify the subject(s), the predicate and the object(s), copied as written
- split lists of subjects or objects into separate items, keeping their order
- keep prepositions that belong to the predicate ("used in", "leads to")
- emit composite phrases ("silk and collagen scaffold") as {"source": [parts], "relation": "compose", "target": [phrase]}

Avoid vague nodes such as "this material", "the method" or "it": resolve them to the specific noun phrase they refer to, or leave the fact out. Never use names of people as sources or targets.

Return a JSON object with a single field "events", a list of objects with:
- "source": list of strings
- "relation": string
- "target": list of strings

Example:
{"events": [
  {"source": ["chitosan", "hydroxyapatite"], "relation": "compose", "target": ["chitosan/hydroxyapatite rods"]},
  {"source": ["scaffold"], "relation": "has", "target": ["porosity", "biodegradability"]}
]}`;

export function extractionUserPrompt(text: string): string {
  return `Context: \`\`\`${text}\`\`\`\nExtract the facts as JSON:`;
}
