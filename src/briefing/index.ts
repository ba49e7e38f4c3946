export { buildBriefingInput, snippet, BRIEFING_INSTRUCTIONS } from "./builder";
export { generateBriefing, DEFAULT_BRIEFING_LIMIT } from "./generate";
export type { BriefingInput } from "./builder";
export type { BriefingResult, Summarizer } from "./generate";
