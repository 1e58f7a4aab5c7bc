/**
 * Layout Analyzer
 *
 * Runs the full inference pipeline against a page accessor:
 *
 *   collect elements → significant elements → repeated groups → slots
 *   → sections → screen type + visual groups → pattern summary
 *
 * Key behaviors:
 * - One pass, one accessor, no state shared between calls
 * - No visible elements → a well-formed empty result (patternType "empty")
 * - Any pipeline failure → a default result carrying `error`; the returned
 *   promise never rejects
 *
 * @module analyzer
 */

import { collectElements } from "./collector.js";
import { resolveConfig, type AnalyzerConfig, type AnalyzerConfigInput } from "./config.js";
import { buildRepeatedGroups, detectRepeatedGroups, detectVisualGroups } from "./groups.js";
import { classifyScreenType } from "./screen-type.js";
import { assembleSections } from "./sections.js";
import { buildSlots, selectSignificantElements } from "./slots.js";
import { NO_FEATURES, summarizePatterns } from "./summary.js";
import type {
	LayoutResult,
	LayoutSection,
	LayoutSlot,
	PageAccessor,
	PatternSummary,
	Section,
	Slot,
	Viewport,
} from "./types.js";
import { log, logError } from "./utils/logger.js";

export interface AnalyzeOptions {
	/** Identifier used for the result id */
	componentId?: string;
	/** Human-readable name; slugified into the result id when given */
	componentName?: string;
	/**
	 * Overrides for the default thresholds. `fallbackViewport` also sizes the
	 * degraded result, unless the overrides themselves are invalid.
	 */
	config?: AnalyzerConfigInput;
}

const FALLBACK_VIEWPORT: Viewport = { width: 1920, height: 1000 };

/**
 * Result id: slugified componentName, else componentId, else "component-001".
 */
export function resolveResultId(options: AnalyzeOptions): string {
	if (options.componentName) {
		return options.componentName.toLowerCase().replace(/[ _]/g, "-");
	}
	return options.componentId || "component-001";
}

function emptySummary(patternType: string): PatternSummary {
	return {
		patternType,
		patternSequence: [],
		sectionCount: 0,
		slotCount: 0,
		features: { ...NO_FEATURES },
		dominantLayout: "flex",
		layoutDistribution: {},
	};
}

function shellResult(id: string, viewport: Viewport, patternType: string): LayoutResult {
	return {
		id,
		screenType: "page",
		viewport: { ...viewport },
		patternSummary: emptySummary(patternType),
		grouping: { repeatedGroups: {}, visualGroups: {}, groupCount: 0 },
		sections: [],
		slots: [],
	};
}

/** Result for a page where no element survived collection. */
export function emptyLayoutResult(viewport: Viewport, componentId?: string): LayoutResult {
	return shellResult(componentId || "unknown", viewport, "empty");
}

/** Result returned when the pipeline itself failed. */
export function failedLayoutResult(error: unknown, componentId?: string, viewport: Viewport = FALLBACK_VIEWPORT): LayoutResult {
	const message = error instanceof Error ? error.message : String(error);
	return {
		...shellResult(componentId || "unknown", viewport, "unknown"),
		error: message || "Layout analysis failed",
	};
}

export function toLayoutSlot(slot: Slot): LayoutSlot {
	const out: LayoutSlot = {
		id: slot.id,
		type: slot.type,
		role: slot.role,
		boundingBox: { ...slot.boundingBox },
	};
	if (slot.aspect) out.aspect = slot.aspect;
	if (slot.repeated && slot.repeatedIndex !== null) {
		out.repeated = true;
		out.repeatedIndex = slot.repeatedIndex;
	}
	if (slot.animations) out.animations = slot.animations;
	if (slot.componentInfo) out.componentInfo = slot.componentInfo;
	return out;
}

export function toLayoutSection(section: Section): LayoutSection {
	const out: LayoutSection = {
		id: section.id,
		role: section.role,
		layoutHints: section.layoutHints,
		slotIds: [...section.slotIds],
	};
	if (section.animations.length > 0) out.animations = [...section.animations];
	if (section.components.length > 0) out.components = [...section.components];
	return out;
}

async function readViewport(accessor: PageAccessor, config: AnalyzerConfig): Promise<Viewport> {
	const viewport = await accessor.viewport();
	return viewport ? { width: viewport.width, height: viewport.height } : { ...config.fallbackViewport };
}

async function runPipeline(accessor: PageAccessor, options: AnalyzeOptions, config: AnalyzerConfig): Promise<LayoutResult> {
	const viewport = await readViewport(accessor, config);

	const collection = await collectElements(accessor, config);
	log("analyzer", `Extracted ${collection.elements.length} visible elements`, {
		scanned: collection.scanned,
		skipped: collection.skipped,
	});

	if (collection.elements.length === 0) {
		return emptyLayoutResult(viewport, options.componentId);
	}

	const significant = selectSignificantElements(collection.elements, config);
	const repeated = detectRepeatedGroups(significant, config.repeatedThreshold);
	const { slots } = buildSlots(significant, viewport, repeated, config);
	const sections = assembleSections(slots, config);
	const screenType = classifyScreenType(significant, sections);
	const visualGroups = detectVisualGroups(slots, config.visualGroupThreshold);

	log("analyzer", `Layout analysis complete: ${sections.length} sections, ${slots.length} slots`);

	return {
		id: resolveResultId(options),
		screenType,
		viewport,
		patternSummary: summarizePatterns(sections, slots, config.patternTypeLength),
		grouping: {
			repeatedGroups: buildRepeatedGroups(slots),
			visualGroups,
			groupCount: Object.keys(visualGroups).length,
		},
		sections: sections.map(toLayoutSection),
		slots: slots.map(toLayoutSlot),
	};
}

/**
 * Analyze the layout of an already loaded page. Never rejects: failures
 * resolve to a default-shaped result with `error` set.
 */
export async function analyzeLayout(accessor: PageAccessor, options: AnalyzeOptions = {}): Promise<LayoutResult> {
	let fallbackViewport = FALLBACK_VIEWPORT;
	try {
		log("analyzer", "Starting layout analysis...");
		const config = resolveConfig(options.config);
		fallbackViewport = config.fallbackViewport;
		return await runPipeline(accessor, options, config);
	} catch (error) {
		logError("analyzer", "Error during layout analysis", error);
		return failedLayoutResult(error, options.componentId, fallbackViewport);
	}
}
