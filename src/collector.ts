/**
 * Element Collector
 *
 * Walks the accessor's element handles in document order and snapshots each
 * visible, non-structural one as an ElementInfo. A handle whose reads fail
 * is skipped on its own; the scan always continues.
 *
 * @module collector
 */

import { classifyElementType } from "./classifier.js";
import type { AnalyzerConfig } from "./config.js";
import { STRUCTURAL_TAGS } from "./keywords.js";
import {
	STYLE_KEYS,
	type CollectOutcome,
	type ElementAccessor,
	type ElementInfo,
	type PageAccessor,
	type SkipReason,
} from "./types.js";
import { logDebug } from "./utils/logger.js";

export interface CollectionReport {
	elements: ElementInfo[];
	/** Number of handles returned by the accessor */
	scanned: number;
	skipped: Record<SkipReason, number>;
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Snapshot a single element. Never rejects: accessor failures become an
 * `error` outcome.
 */
export async function collectElement(handle: ElementAccessor): Promise<CollectOutcome> {
	try {
		const tag = (await handle.tagName()).toLowerCase();
		if (STRUCTURAL_TAGS.has(tag)) {
			return { ok: false, reason: "structural", detail: tag };
		}

		const box = await handle.boundingBox();
		if (!box || box.width === 0 || box.height === 0) {
			return { ok: false, reason: "no-area", detail: tag };
		}

		const textContent = (await handle.textContent()).trim();
		const classNames = await handle.classList();
		const id = (await handle.id()) || null;
		const role = (await handle.ariaRole()) || null;

		if (!(await handle.isVisible())) {
			return { ok: false, reason: "hidden", detail: tag };
		}

		const hasChildren = await handle.hasChildren();
		const computedStyles = await handle.computedStyle(STYLE_KEYS);
		const animations = await handle.detectAnimation();
		const componentInfo = await handle.detectComponentHints();

		const element: ElementInfo = {
			tag,
			boundingBox: { x: box.x, y: box.y, width: box.width, height: box.height },
			textContent,
			classNames: [...classNames],
			id,
			role,
			elementType: classifyElementType(tag, classNames, computedStyles),
			isVisible: true,
			hasChildren,
			computedStyles: { ...computedStyles },
			animations,
			componentInfo,
		};
		return { ok: true, element };
	} catch (error) {
		return { ok: false, reason: "error", detail: errorMessage(error) };
	}
}

async function releaseHandle(handle: ElementAccessor): Promise<void> {
	if (!handle.dispose) return;
	try {
		await handle.dispose();
	} catch (error) {
		logDebug("collector", "Failed to release element handle", errorMessage(error));
	}
}

/**
 * Collect up to `config.maxElements` elements. Every handle is released
 * after it is read, whatever the outcome. Rejects only if enumeration
 * itself fails; the pipeline turns that into a degraded result.
 */
export async function collectElements(accessor: PageAccessor, config: AnalyzerConfig): Promise<CollectionReport> {
	const handles = await accessor.enumerateElements(config.rootSelector, config.maxElements);
	// Bound the scan even if the accessor ignores maxCount
	const candidates = handles.slice(0, config.maxElements);
	await Promise.all(handles.slice(config.maxElements).map(releaseHandle));

	const report: CollectionReport = {
		elements: [],
		scanned: candidates.length,
		skipped: { structural: 0, "no-area": 0, hidden: 0, error: 0 },
	};

	for (const handle of candidates) {
		const outcome = await collectElement(handle);
		await releaseHandle(handle);
		if (outcome.ok) {
			report.elements.push(outcome.element);
			continue;
		}
		report.skipped[outcome.reason]++;
		if (outcome.reason === "error") {
			logDebug("collector", "Skipping element due to error", outcome.detail);
		}
	}

	return report;
}
