/**
 * Analyzer configuration.
 *
 * Every threshold the heuristics use lives here so callers can tune them
 * per site. `resolveConfig` merges a partial config over the defaults and
 * validates the result.
 *
 * @module config
 */

import { z } from "zod";

const ratio = z.number().gt(0).lte(1);
const positive = z.number().positive();

export const HeroConfigSchema = z.object({
	/** Elements starting above this fraction of the viewport height count as "top" */
	topRatio: ratio.default(0.3),
	/** An element wider than this (px) is large */
	minWidth: positive.default(300),
	/** An element taller than this (px) is large */
	minHeight: positive.default(200),
});

export const ViewportSchema = z.object({
	width: positive,
	height: positive,
});

export const AnalyzerConfigSchema = z.object({
	/** Selector passed to the accessor when enumerating candidates */
	rootSelector: z.string().min(1).default("body *"),
	/** Upper bound on scanned candidates */
	maxElements: z.number().int().positive().default(1000),
	/** Both dimensions must reach this (px) for an element to be significant */
	minElementSize: positive.default(20),
	/** Non-text elements smaller than this (px) in both dimensions get no slot */
	minSlotSize: positive.default(50),
	/** Containers at least this wide (fraction of viewport)... */
	shellWidthRatio: ratio.default(0.9),
	/** ...and this tall are treated as page shells */
	shellHeightRatio: ratio.default(0.7),
	hero: HeroConfigSchema.default({}),
	/** Max relative width/height difference inside a repeated group */
	repeatedThreshold: ratio.default(0.1),
	/** Row bin size for grid detection (normalized) */
	gridRowTolerance: ratio.default(0.05),
	/** Section bin size (normalized) */
	sectionTolerance: ratio.default(0.1),
	/** Alignment/proximity threshold for visual groups (normalized) */
	visualGroupThreshold: ratio.default(0.02),
	aspectTolerance: ratio.default(0.01),
	/** Used when the accessor reports no viewport */
	fallbackViewport: ViewportSchema.default({ width: 1920, height: 1000 }),
	/** Number of sequence entries joined into patternType */
	patternTypeLength: z.number().int().positive().default(5),
});

export type AnalyzerConfig = z.output<typeof AnalyzerConfigSchema>;
export type AnalyzerConfigInput = z.input<typeof AnalyzerConfigSchema>;
export type HeroConfig = z.output<typeof HeroConfigSchema>;

export const DEFAULT_CONFIG: AnalyzerConfig = AnalyzerConfigSchema.parse({});

/**
 * Merge overrides over the defaults. Throws a ZodError on invalid values.
 */
export function resolveConfig(overrides: AnalyzerConfigInput = {}): AnalyzerConfig {
	// Field-level defaults also fill a partially specified `hero`
	return AnalyzerConfigSchema.parse(overrides);
}
