/**
 * Snapshot Accessor
 *
 * In-memory PageAccessor over a recorded page: the same raw data the browser
 * would report (geometry, text, classes, styles, attributes), stored as JSON.
 * Used for offline analysis of captured pages and for tests.
 */

import { readFile } from "fs/promises";
import { z } from "zod";
import { summarizeAnimation, summarizeComponent } from "../hints.js";
import type { ComputedStyleSubset, ElementAccessor, PageAccessor } from "../types.js";

const BoundingBoxSchema = z.object({
	x: z.number(),
	y: z.number(),
	width: z.number().nonnegative(),
	height: z.number().nonnegative(),
});

const ComputedStyleSchema = z
	.object({
		display: z.string(),
		flexDirection: z.string(),
		gridTemplateColumns: z.string(),
		gap: z.string(),
		alignItems: z.string(),
		justifyContent: z.string(),
		backgroundImage: z.string(),
	})
	.partial();

const styleValue = z.string().nullable().optional();

const AnimationStylesSchema = z.object({
	animation: styleValue,
	animationName: styleValue,
	animationDuration: styleValue,
	animationTimingFunction: styleValue,
	animationDelay: styleValue,
	animationIterationCount: styleValue,
	animationDirection: styleValue,
	transition: styleValue,
	transitionProperty: styleValue,
	transitionDuration: styleValue,
	transitionTimingFunction: styleValue,
	transform: styleValue,
});

export const SnapshotElementSchema = z.object({
	tag: z.string().min(1),
	/** Pixel box, null for elements that are not rendered */
	box: BoundingBoxSchema.nullable().default(null),
	text: z.string().default(""),
	classes: z.array(z.string()).default([]),
	id: z.string().nullable().default(null),
	role: z.string().nullable().default(null),
	visible: z.boolean().default(true),
	hasChildren: z.boolean().default(false),
	styles: ComputedStyleSchema.default({}),
	animationStyles: AnimationStylesSchema.default({}),
	attributes: z.array(z.object({ name: z.string(), value: z.string() })).default([]),
	/** Every read on this element rejects, as with a detached handle */
	fail: z.boolean().default(false),
});

export const PageSnapshotSchema = z.object({
	viewport: z.object({ width: z.number().positive(), height: z.number().positive() }).nullable().default(null),
	elements: z.array(SnapshotElementSchema),
});

export type SnapshotElement = z.output<typeof SnapshotElementSchema>;
export type SnapshotElementInput = z.input<typeof SnapshotElementSchema>;
export type PageSnapshot = z.output<typeof PageSnapshotSchema>;
export type PageSnapshotInput = z.input<typeof PageSnapshotSchema>;

/** Validate raw snapshot data. Throws a ZodError on invalid input. */
export function parsePageSnapshot(input: unknown): PageSnapshot {
	return PageSnapshotSchema.parse(input);
}

/** Read and validate a snapshot JSON file. */
export async function readPageSnapshot(file: string): Promise<PageSnapshot> {
	const content = await readFile(file, "utf-8");
	return parsePageSnapshot(JSON.parse(content));
}

function elementAccessor(element: SnapshotElement): ElementAccessor {
	const read = async <T>(value: () => T): Promise<T> => {
		if (element.fail) {
			throw new Error(`Element <${element.tag}> is detached`);
		}
		return value();
	};

	return {
		tagName: () => read(() => element.tag),
		boundingBox: () => read(() => (element.box ? { ...element.box } : null)),
		textContent: () => read(() => element.text),
		classList: () => read(() => [...element.classes]),
		id: () => read(() => element.id),
		ariaRole: () => read(() => element.role),
		isVisible: () => read(() => element.visible),
		hasChildren: () => read(() => element.hasChildren),
		computedStyle: (keys) =>
			read(() => {
				const values: ComputedStyleSubset = {};
				for (const key of keys) {
					const value = element.styles[key];
					if (value !== undefined) values[key] = value;
				}
				return values;
			}),
		detectAnimation: () => read(() => summarizeAnimation(element.animationStyles)),
		detectComponentHints: () =>
			read(() => summarizeComponent({ attributes: element.attributes, classList: element.classes })),
	};
}

/**
 * Accessor over a snapshot. The elements are already the selection, so the
 * root selector is not applied; `maxCount` still bounds the result.
 */
export function createSnapshotAccessor(snapshot: PageSnapshot): PageAccessor {
	return {
		async viewport() {
			return snapshot.viewport ? { ...snapshot.viewport } : null;
		},

		async enumerateElements(_rootSelector: string, maxCount: number) {
			return snapshot.elements.slice(0, maxCount).map(elementAccessor);
		},
	};
}
