/**
 * Shared Type Definitions
 *
 * Wire format of a layout analysis, consumed by downstream template converters:
 * - Viewport / BoundingBox: page geometry (pixel or viewport-normalized)
 * - LayoutSlot: an atomic content unit (text, image, container)
 * - LayoutSection: a vertically stacked band of slots
 * - PatternSummary: role sequence, feature flags, dominant layout
 * - LayoutResult: complete page analysis result
 *
 * Field names are stable; optional keys are omitted rather than set to null.
 *
 * @module shared/types
 */

/**
 * Viewport dimensions in pixels. Basis for every normalized coordinate.
 */
export interface Viewport {
	width: number;
	height: number;
}

/**
 * Bounding box. In pixel space this is viewport-relative as reported by the
 * browser; after normalization each component is a fraction of the viewport
 * rounded to 4 decimals.
 */
export interface BoundingBox {
	x: number;
	y: number;
	width: number;
	height: number;
}

/**
 * Coarse content type of a slot.
 */
export type SlotType = "image" | "text" | "container";

/**
 * Closed vocabulary that raw roles are canonicalized to.
 */
export type CanonicalRole =
	| "hero"
	| "card"
	| "card-grid"
	| "content"
	| "navigation"
	| "headline"
	| "subhead"
	| "body-text"
	| "image"
	| "hero-image"
	| "cta"
	| "footer";

/**
 * Role of a slot or section. Unmapped raw roles pass through verbatim.
 */
export type LayoutRole = CanonicalRole | (string & {});

/**
 * Coarse page archetype.
 */
export type ScreenType =
	| "auth"
	| "services"
	| "pricing"
	| "portfolio"
	| "blog"
	| "landing"
	| "dashboard"
	| "page";

/**
 * CSS animation/transition properties found on an element.
 * Only non-empty, non-"none" values are present.
 */
export interface AnimationInfo {
	animation?: string;
	animationName?: string;
	animationDuration?: string;
	animationTimingFunction?: string;
	animationDelay?: string;
	animationIterationCount?: string;
	animationDirection?: string;
	transition?: string;
	transitionProperty?: string;
	transitionDuration?: string;
	transitionTimingFunction?: string;
	transform?: string;
}

/**
 * Front-end component markers found on an element.
 */
export interface ComponentInfo {
	/** Set when a React component marker attribute is present */
	reactComponent?: boolean;
	/** Value of the React component marker attribute */
	componentId?: string;
	/** data-* attributes keyed without the "data-" prefix */
	dataAttributes?: Record<string, string>;
	/** Classes that look like component names */
	componentClasses?: string[];
	vueComponent?: boolean;
	angularComponent?: boolean;
}

export interface GridLayoutHints {
	displayType: "grid";
	gridColumns: number;
	/** Average horizontal gap between row members, normalized, 3 decimals */
	gap: number;
	alignment: "center";
}

export interface FlexLayoutHints {
	displayType: "flex";
	flexDirection: "column";
	/** Gap in pixels */
	gap: number;
	alignment: "start";
}

export type LayoutHints = GridLayoutHints | FlexLayoutHints;

export type DisplayType = LayoutHints["displayType"];

/**
 * A slot in the produced layout.
 */
export interface LayoutSlot {
	/** Unique within one LayoutResult */
	id: string;
	type: SlotType;
	role: LayoutRole;
	/** Viewport-normalized */
	boundingBox: BoundingBox;
	/** Simplified aspect ratio ("16:9"), present only for images */
	aspect?: string;
	/** Present (true) only for members of a repeated group */
	repeated?: boolean;
	/** Position within the repeated group, present iff repeated */
	repeatedIndex?: number;
	animations?: AnimationInfo;
	componentInfo?: ComponentInfo;
}

export interface SectionAnimation {
	slotId: string;
	animation: AnimationInfo;
}

export interface SectionComponent {
	slotId: string;
	component: ComponentInfo;
}

/**
 * A vertically stacked section. Sections partition the slot set.
 */
export interface LayoutSection {
	id: string;
	role: LayoutRole;
	layoutHints: LayoutHints;
	slotIds: string[];
	animations?: SectionAnimation[];
	components?: SectionComponent[];
}

export interface RepeatedGroupItem {
	index: number;
	slotIds: string[];
}

/**
 * Same-shaped slots sharing a role, keyed `repeated-<role>`.
 */
export interface RepeatedGroup {
	role: LayoutRole;
	count: number;
	items: RepeatedGroupItem[];
}

export interface Grouping {
	repeatedGroups: Record<string, RepeatedGroup>;
	/** Slot ids keyed `group-<n>` */
	visualGroups: Record<string, string[]>;
	/** Number of visual groups */
	groupCount: number;
}

export interface PatternFeatures {
	hasNavigation: boolean;
	hasHero: boolean;
	hasCardGrid: boolean;
	hasFooter: boolean;
	hasImages: boolean;
	hasRepeatedGroups: boolean;
}

export interface PatternSummary {
	/** First entries of patternSequence joined with "-"; "empty" or "unknown" for degenerate results */
	patternType: string;
	/** Section roles with adjacent duplicates collapsed */
	patternSequence: LayoutRole[];
	sectionCount: number;
	slotCount: number;
	features: PatternFeatures;
	dominantLayout: DisplayType;
	layoutDistribution: Partial<Record<DisplayType, number>>;
}

/**
 * Complete layout analysis for one page.
 */
export interface LayoutResult {
	id: string;
	screenType: ScreenType;
	viewport: Viewport;
	patternSummary: PatternSummary;
	grouping: Grouping;
	sections: LayoutSection[];
	slots: LayoutSlot[];
	/** Present only when the analysis degraded to the default result */
	error?: string;
}
