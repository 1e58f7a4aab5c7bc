/**
 * Type Definitions
 *
 * Re-exports the wire types from @layout-lens/shared and declares the
 * engine-side structures: the page accessor capability, collected elements,
 * and the intermediate slot/section records the pipeline stages pass along.
 *
 * @module types
 */

import type {
	AnimationInfo,
	BoundingBox,
	ComponentInfo,
	LayoutHints,
	LayoutRole,
	SectionAnimation,
	SectionComponent,
	SlotType,
	Viewport,
} from "@layout-lens/shared";

export type * from "@layout-lens/shared";

/** Computed style properties read for every element. */
export const STYLE_KEYS = [
	"display",
	"flexDirection",
	"gridTemplateColumns",
	"gap",
	"alignItems",
	"justifyContent",
	"backgroundImage",
] as const;

export type StyleKey = (typeof STYLE_KEYS)[number];

export type ComputedStyleSubset = Partial<Record<StyleKey, string>>;

/**
 * A DOM element as seen through the accessor. Every call may reject
 * (detached node, closed page); the collector handles that per element.
 */
export interface ElementAccessor {
	tagName(): Promise<string>;
	/** Pixel box relative to the viewport, or null when not rendered */
	boundingBox(): Promise<BoundingBox | null>;
	textContent(): Promise<string>;
	classList(): Promise<string[]>;
	id(): Promise<string | null>;
	ariaRole(): Promise<string | null>;
	/** Visibility by computed display/visibility/opacity and offset size */
	isVisible(): Promise<boolean>;
	hasChildren(): Promise<boolean>;
	computedStyle(keys: readonly StyleKey[]): Promise<ComputedStyleSubset>;
	detectAnimation(): Promise<AnimationInfo | null>;
	detectComponentHints(): Promise<ComponentInfo | null>;
	/** Release the underlying handle; the collector calls it once per element */
	dispose?(): Promise<void>;
}

/**
 * Read-only view of an already loaded page. Waiting for readiness is the
 * caller's job.
 */
export interface PageAccessor {
	viewport(): Promise<Viewport | null>;
	/** Element handles in document order, at most maxCount of them */
	enumerateElements(rootSelector: string, maxCount: number): Promise<ElementAccessor[]>;
}

export type ElementType = SlotType;

/**
 * Snapshot of one visible, non-structural element.
 */
export interface ElementInfo {
	readonly tag: string;
	readonly boundingBox: Readonly<BoundingBox>;
	readonly textContent: string;
	readonly classNames: readonly string[];
	readonly id: string | null;
	readonly role: string | null;
	readonly elementType: ElementType;
	readonly isVisible: boolean;
	readonly hasChildren: boolean;
	readonly computedStyles: Readonly<ComputedStyleSubset>;
	readonly animations: AnimationInfo | null;
	readonly componentInfo: ComponentInfo | null;
}

export type SkipReason = "structural" | "no-area" | "hidden" | "error";

export type CollectOutcome =
	| { ok: true; element: ElementInfo }
	| { ok: false; reason: SkipReason; detail?: string };

/**
 * Slot record passed between pipeline stages. Serialized to LayoutSlot at the
 * end, with null fields dropped.
 */
export interface Slot {
	readonly id: string;
	readonly type: SlotType;
	readonly role: LayoutRole;
	/** Viewport-normalized */
	readonly boundingBox: Readonly<BoundingBox>;
	readonly aspect: string | null;
	readonly repeated: boolean;
	readonly repeatedIndex: number | null;
	readonly animations: AnimationInfo | null;
	readonly componentInfo: ComponentInfo | null;
}

export type SlotOutcome =
	| { ok: true; slot: Slot }
	| { ok: false; reason: "too-small" | "page-shell" | "empty-container" | "error"; detail?: string };

export interface Section {
	readonly id: string;
	readonly role: LayoutRole;
	readonly layoutHints: LayoutHints;
	readonly slotIds: readonly string[];
	readonly animations: readonly SectionAnimation[];
	readonly components: readonly SectionComponent[];
}

/**
 * Indices into the significant-element list that share one shape.
 * `members[0]` is the leader.
 */
export interface ElementGroup {
	readonly leader: number;
	readonly members: readonly number[];
}
