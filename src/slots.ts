/**
 * Slot Builder
 *
 * Turns significant elements into slots: drops icons, page shells and empty
 * wrappers, infers a canonical role, assigns ids, normalizes geometry to the
 * viewport and attaches aspect ratio and repetition data.
 *
 * @module slots
 */

import { hasHeadlineSignal, inferSemanticRole, isLargeElement, normalizeRole } from "./classifier.js";
import type { AnalyzerConfig } from "./config.js";
import { BLOCK_TEXT_TAGS } from "./keywords.js";
import type { BoundingBox, ElementGroup, ElementInfo, Slot, SlotOutcome, SlotType, Viewport } from "./types.js";
import { logWarn } from "./utils/logger.js";

/** Common aspect ratios, checked before the generic search */
const COMMON_RATIOS: ReadonlyArray<readonly [number, number]> = [
	[1, 1],
	[4, 3],
	[16, 9],
	[16, 10],
	[21, 9],
	[3, 2],
	[2, 1],
];

const MAX_DENOMINATOR = 20;

export interface SlotBuildReport {
	slots: Slot[];
	skipped: number;
}

export function roundTo(value: number, decimals: number): number {
	const factor = 10 ** decimals;
	return Math.round(value * factor) / factor;
}

/**
 * Elements whose both dimensions reach `minElementSize`. Repeated-group
 * detection, slot building and screen classification all work on this list.
 */
export function selectSignificantElements(elements: readonly ElementInfo[], config: AnalyzerConfig): ElementInfo[] {
	return elements.filter(
		(el) => el.boundingBox.width >= config.minElementSize && el.boundingBox.height >= config.minElementSize,
	);
}

/**
 * Simplify width/height to a ratio label such as "16:9".
 * Returns null for zero height or when no ratio is within tolerance.
 */
export function simplifyRatio(width: number, height: number, tolerance = 0.01): string | null {
	if (height === 0) return null;

	const ratio = width / height;

	for (const [w, h] of COMMON_RATIOS) {
		if (Math.abs(ratio - w / h) < tolerance) return `${w}:${h}`;
	}

	let bestMatch: string | null = null;
	let bestDiff = Number.POSITIVE_INFINITY;
	for (let denom = 1; denom <= MAX_DENOMINATOR; denom++) {
		const num = Math.round(ratio * denom);
		if (num === 0) continue;
		const diff = Math.abs(ratio - num / denom);
		if (diff < bestDiff && diff < tolerance) {
			bestDiff = diff;
			bestMatch = `${num}:${denom}`;
		}
	}

	return bestMatch;
}

/**
 * Aspect label for an image slot. Falls back to "<ratio>:1" when the ratio
 * has no simple form, so every image slot carries one.
 */
export function describeAspect(width: number, height: number, tolerance = 0.01): string {
	const simplified = simplifyRatio(width, height, tolerance);
	if (simplified) return simplified;
	if (height === 0) return "0:1";
	return `${(width / height).toFixed(2)}:1`;
}

/**
 * Clip a pixel box to the positive quadrant (elements scrolled or
 * positioned past the viewport origin).
 */
export function clipToOrigin(box: BoundingBox): BoundingBox {
	const x = Math.max(0, box.x);
	const y = Math.max(0, box.y);
	return {
		x,
		y,
		width: Math.max(0, box.width - (x - box.x)),
		height: Math.max(0, box.height - (y - box.y)),
	};
}

/**
 * Convert a pixel box to viewport fractions rounded to 4 decimals.
 * A zero-sized viewport leaves the box untouched.
 */
export function normalizeBoundingBox(box: BoundingBox, viewport: Viewport): BoundingBox {
	if (viewport.width === 0 || viewport.height === 0) {
		return { ...box };
	}

	return {
		x: roundTo(box.x / viewport.width, 4),
		y: roundTo(box.y / viewport.height, 4),
		width: roundTo(box.width / viewport.width, 4),
		height: roundTo(box.height / viewport.height, 4),
	};
}

/**
 * Map each grouped element index to its position inside its group.
 */
export function repeatedMembership(groups: readonly ElementGroup[]): Map<number, number> {
	const membership = new Map<number, number>();
	for (const group of groups) {
		group.members.forEach((elementIndex, position) => membership.set(elementIndex, position));
	}
	return membership;
}

function isPageShell(element: ElementInfo, viewport: Viewport, config: AnalyzerConfig): boolean {
	return (
		element.elementType === "container" &&
		element.hasChildren &&
		element.boundingBox.width >= viewport.width * config.shellWidthRatio &&
		element.boundingBox.height >= viewport.height * config.shellHeightRatio
	);
}

/**
 * Slot type for an element, or null when it is an empty non-text wrapper.
 * Inline text (span, a, button, label) becomes a container.
 */
function resolveSlotType(element: ElementInfo): SlotType | null {
	if (element.elementType === "container" && element.hasChildren) return "container";
	if (element.elementType === "text" && BLOCK_TEXT_TAGS.has(element.tag)) return "text";
	if (element.elementType === "image") return "image";
	if (!element.textContent && !element.hasChildren) return null;
	return "container";
}

/** Per-call state threaded through slot construction. */
interface SlotBuildState {
	readonly viewport: Viewport;
	readonly config: AnalyzerConfig;
	readonly membership: ReadonlyMap<number, number>;
	readonly usedIds: Set<string>;
	counter: number;
}

function allocateSlotId(element: ElementInfo, role: string, state: SlotBuildState): string {
	const base = element.id ? `slot-${element.id}` : `slot-${role}-${state.counter}`;
	let id = base;
	let suffix = state.counter;
	while (state.usedIds.has(id)) {
		id = `${base}-${suffix++}`;
	}
	state.usedIds.add(id);
	// The counter advances for DOM-id slots too
	state.counter++;
	return id;
}

function buildSlot(element: ElementInfo, index: number, state: SlotBuildState): SlotOutcome {
	const { viewport, config } = state;
	const box = element.boundingBox;

	if (box.width < config.minSlotSize && box.height < config.minSlotSize && element.elementType !== "text") {
		return { ok: false, reason: "too-small" };
	}

	if (isPageShell(element, viewport, config)) {
		return { ok: false, reason: "page-shell" };
	}

	const rawRole = inferSemanticRole(
		element,
		{
			positionInViewport: viewport.height > 0 ? box.y / viewport.height : 0.5,
			isLarge: isLargeElement(element, config.hero),
			hasHeadline: hasHeadlineSignal(element),
		},
		config.hero,
	);
	const role = normalizeRole(rawRole);

	const type = resolveSlotType(element);
	if (!type) {
		return { ok: false, reason: "empty-container" };
	}

	const repeatedIndex = state.membership.get(index);

	const slot: Slot = {
		id: allocateSlotId(element, role, state),
		type,
		role,
		boundingBox: normalizeBoundingBox(clipToOrigin(box), viewport),
		aspect: type === "image" ? describeAspect(box.width, box.height, config.aspectTolerance) : null,
		repeated: repeatedIndex !== undefined,
		repeatedIndex: repeatedIndex ?? null,
		animations: element.animations,
		componentInfo: element.componentInfo,
	};
	return { ok: true, slot };
}

/**
 * Build slots for the significant elements. A failure on one element is
 * logged and that element is skipped.
 */
export function buildSlots(
	elements: readonly ElementInfo[],
	viewport: Viewport,
	groups: readonly ElementGroup[],
	config: AnalyzerConfig,
): SlotBuildReport {
	const state: SlotBuildState = {
		viewport,
		config,
		membership: repeatedMembership(groups),
		usedIds: new Set(),
		counter: 0,
	};
	const report: SlotBuildReport = { slots: [], skipped: 0 };

	elements.forEach((element, index) => {
		let outcome: SlotOutcome;
		try {
			outcome = buildSlot(element, index, state);
		} catch (error) {
			outcome = { ok: false, reason: "error", detail: error instanceof Error ? error.message : String(error) };
			logWarn("slots", `Skipping <${element.tag}> after classification failure`, outcome.detail);
		}

		if (outcome.ok) {
			report.slots.push(outcome.slot);
		} else {
			report.skipped++;
		}
	});

	return report;
}
