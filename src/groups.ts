/**
 * Group Detector
 *
 * Clustering passes over elements and slots:
 * - repeated groups: same-shaped elements (cards, list items)
 * - grid layout: columns and gap of the dominant row of a slot set
 * - visual groups: slots aligned with or close to each other
 *
 * @module groups
 */

import { roundTo } from "./slots.js";
import type { ElementGroup, ElementInfo, GridLayoutHints, RepeatedGroup, Slot } from "./types.js";

function relativeDifference(a: number, b: number): number {
	const max = Math.max(a, b);
	return max > 0 ? Math.abs(a - b) / max : 1;
}

/**
 * Group elements whose width and height each differ by less than
 * `threshold` of the larger value. Greedy and first-found wins: an element
 * joins at most one group. Singletons are dropped.
 */
export function detectRepeatedGroups(elements: readonly ElementInfo[], threshold = 0.1): ElementGroup[] {
	const groups: ElementGroup[] = [];
	const processed = new Set<number>();

	for (let i = 0; i < elements.length; i++) {
		if (processed.has(i)) continue;

		const { width: w1, height: h1 } = elements[i].boundingBox;
		const members = [i];

		for (let j = i + 1; j < elements.length; j++) {
			if (processed.has(j)) continue;

			const { width: w2, height: h2 } = elements[j].boundingBox;
			if (relativeDifference(w1, w2) < threshold && relativeDifference(h1, h2) < threshold) {
				members.push(j);
				processed.add(j);
			}
		}

		if (members.length > 1) {
			groups.push({ leader: i, members });
			processed.add(i);
		}
	}

	return groups;
}

/**
 * Detect a grid from normalized slot positions. Slots are binned into rows
 * by y; the fullest row (first on ties) gives the column count and gap.
 * Returns null when no row has two members.
 */
export function detectGridLayout(slots: readonly Slot[], rowTolerance = 0.05): GridLayoutHints | null {
	if (slots.length < 2) return null;

	const rows = new Map<number, Slot[]>();
	for (const slot of slots) {
		const key = Math.round(slot.boundingBox.y / rowTolerance);
		const row = rows.get(key);
		if (row) {
			row.push(slot);
		} else {
			rows.set(key, [slot]);
		}
	}

	let representative: Slot[] = [];
	for (const row of rows.values()) {
		if (row.length > representative.length) representative = row;
	}
	if (representative.length < 2) return null;

	const ordered = [...representative].sort((a, b) => a.boundingBox.x - b.boundingBox.x);

	const gaps: number[] = [];
	for (let i = 0; i < ordered.length - 1; i++) {
		const right = ordered[i].boundingBox.x + ordered[i].boundingBox.width;
		const gap = ordered[i + 1].boundingBox.x - right;
		if (gap > 0) gaps.push(gap);
	}
	const avgGap = gaps.length > 0 ? gaps.reduce((sum, gap) => sum + gap, 0) / gaps.length : 0;

	return {
		displayType: "grid",
		gridColumns: ordered.length,
		gap: roundTo(avgGap, 3),
		alignment: "center",
	};
}

/**
 * Cluster slots that line up horizontally or vertically with the same role,
 * or sit close together regardless of role. Groups are named `group-<n>`.
 */
export function detectVisualGroups(slots: readonly Slot[], threshold = 0.02): Record<string, string[]> {
	const groups: Record<string, string[]> = {};
	const processed = new Set<string>();
	let groupCounter = 0;

	for (let i = 0; i < slots.length; i++) {
		const first = slots[i];
		if (processed.has(first.id)) continue;

		const group = [first.id];
		processed.add(first.id);

		for (const second of slots.slice(i + 1)) {
			if (processed.has(second.id)) continue;

			const xDiff = Math.abs(first.boundingBox.x - second.boundingBox.x);
			const yDiff = Math.abs(first.boundingBox.y - second.boundingBox.y);

			const horizontallyAligned = yDiff < threshold;
			const verticallyAligned = xDiff < threshold;
			const close = xDiff + yDiff < threshold * 3;

			if ((horizontallyAligned || verticallyAligned || close) && (first.role === second.role || close)) {
				group.push(second.id);
				processed.add(second.id);
			}
		}

		if (group.length > 1) {
			groups[`group-${groupCounter}`] = group;
			groupCounter++;
		}
	}

	return groups;
}

/**
 * Collect repeated slots by role, then by position within their group.
 * Keys are `repeated-<role>`; items are sorted by index.
 */
export function buildRepeatedGroups(slots: readonly Slot[]): Record<string, RepeatedGroup> {
	const byRole = new Map<string, Map<number, string[]>>();

	for (const slot of slots) {
		if (!slot.repeated || slot.repeatedIndex === null) continue;

		let indices = byRole.get(slot.role);
		if (!indices) {
			indices = new Map();
			byRole.set(slot.role, indices);
		}
		const slotIds = indices.get(slot.repeatedIndex);
		if (slotIds) {
			slotIds.push(slot.id);
		} else {
			indices.set(slot.repeatedIndex, [slot.id]);
		}
	}

	const result: Record<string, RepeatedGroup> = {};
	for (const [role, indices] of byRole) {
		result[`repeated-${role}`] = {
			role,
			count: indices.size,
			items: [...indices.entries()]
				.sort(([a], [b]) => a - b)
				.map(([index, slotIds]) => ({ index, slotIds })),
		};
	}
	return result;
}
