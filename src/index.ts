/**
 * layout-lens
 *
 * Infers the semantic layout of a rendered page: sections, slots, repeated
 * structures and a pattern summary.
 *
 * Usage with Playwright (navigation and waiting stay with the caller):
 *
 *   await page.goto(url, { waitUntil: "networkidle" });
 *   const layout = await analyzeLayout(createPlaywrightAccessor(page), { componentName: "Pricing Page" });
 *
 * @module index
 */

export { analyzeLayout, emptyLayoutResult, failedLayoutResult, resolveResultId } from "./analyzer.js";
export type { AnalyzeOptions } from "./analyzer.js";
export { AnalyzerConfigSchema, DEFAULT_CONFIG, resolveConfig } from "./config.js";
export type { AnalyzerConfig, AnalyzerConfigInput, HeroConfig } from "./config.js";
export { collectElement, collectElements } from "./collector.js";
export type { CollectionReport } from "./collector.js";
export { classifyElementType, inferSemanticRole, normalizeRole } from "./classifier.js";
export { summarizeAnimation, summarizeComponent } from "./hints.js";
export { buildSlots, describeAspect, normalizeBoundingBox, selectSignificantElements, simplifyRatio } from "./slots.js";
export { buildRepeatedGroups, detectGridLayout, detectRepeatedGroups, detectVisualGroups } from "./groups.js";
export { assembleSections } from "./sections.js";
export { summarizePatterns } from "./summary.js";
export { classifyScreenType } from "./screen-type.js";
export { createPlaywrightAccessor } from "./accessor/playwright.js";
export {
	PageSnapshotSchema,
	createSnapshotAccessor,
	parsePageSnapshot,
	readPageSnapshot,
} from "./accessor/snapshot.js";
export type { PageSnapshot, PageSnapshotInput, SnapshotElement, SnapshotElementInput } from "./accessor/snapshot.js";
export { STYLE_KEYS } from "./types.js";
export type * from "./types.js";
