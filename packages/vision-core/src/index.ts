export * from "./errors";
export * from "./types/image";
export * from "./image/schemas";
export * from "./image/frame";
export * from "./image/region";
export type { MatchResult, TemplateMatcher } from "./cv/matching/TemplateMatcherPort";
export { SsdTemplateMatcher, matchTemplate } from "./cv/matching/ssdMatcher";
