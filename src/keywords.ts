/**
 * Keyword and tag tables used by the classifiers. Static data only.
 *
 * @module keywords
 */

import type { CanonicalRole, ScreenType } from "./types.js";

/** Tags that never represent rendered content */
export const STRUCTURAL_TAGS: ReadonlySet<string> = new Set([
	"script",
	"style",
	"meta",
	"link",
	"noscript",
	"template",
	"head",
	"html",
]);

export const IMAGE_TAGS: ReadonlySet<string> = new Set(["img", "picture", "svg"]);

export const TEXT_TAGS: ReadonlySet<string> = new Set([
	"h1",
	"h2",
	"h3",
	"h4",
	"h5",
	"h6",
	"p",
	"span",
	"a",
	"button",
	"label",
]);

/** Text tags that stay `text` slots; other text tags become containers */
export const BLOCK_TEXT_TAGS: ReadonlySet<string> = new Set(["h1", "h2", "h3", "h4", "h5", "h6", "p"]);

export const HEADLINE_TAGS: ReadonlySet<string> = new Set(["h1", "h2", "h3"]);

export const SUBHEAD_TAGS: ReadonlySet<string> = new Set(["h4", "h5", "h6"]);

export const BUTTON_TAGS: ReadonlySet<string> = new Set(["button", "a"]);

/** Utility class fragments that mark a background-image container */
export const BACKGROUND_IMAGE_TOKENS = ["bg-cover", "bg-image", "bg-img", "hero-image"] as const;

export const HERO_TOKEN = "hero";
export const CARD_TOKEN = "card";
export const GRID_TOKEN = "grid";
export const NAV_TOKEN = "nav";
export const HEADLINE_CLASS_TOKEN = "headline";
export const BUTTON_CLASS_TOKENS = ["cta", "button"] as const;

/** Raw role aliases, lower-case, mapped onto the closed vocabulary */
export const ROLE_ALIASES: ReadonlyMap<string, CanonicalRole> = new Map<string, CanonicalRole>([
	["hero", "hero"],
	["hero-split", "hero"],
	["hero-section", "hero"],
	["card", "card"],
	["card-item", "card"],
	["card-grid", "card-grid"],
	["content", "content"],
	["content-block", "content"],
	["content-section", "content"],
	["content-area", "content"],
	["nav", "navigation"],
	["navigation", "navigation"],
	["navbar", "navigation"],
	["menu", "navigation"],
	["headline", "headline"],
	["heading", "headline"],
	["title", "headline"],
	["h1", "headline"],
	["h2", "headline"],
	["h3", "headline"],
	["subhead", "subhead"],
	["subheading", "subhead"],
	["subtitle", "subhead"],
	["h4", "subhead"],
	["h5", "subhead"],
	["h6", "subhead"],
	["body", "body-text"],
	["paragraph", "body-text"],
	["text", "body-text"],
	["p", "body-text"],
	["image", "image"],
	["img", "image"],
	["picture", "image"],
	["photo", "image"],
	["hero-image", "hero-image"],
	["hero-img", "hero-image"],
	["cta", "cta"],
	["button", "cta"],
	["call-to-action", "cta"],
	["action", "cta"],
	["footer", "footer"],
	["foot", "footer"],
]);

export const AUTH_TEXT_KEYWORDS = [
	"sign in",
	"sign-in",
	"signin",
	"log in",
	"login",
	"log-in",
	"password",
	"email",
	"create account",
	"sign up",
	"signup",
	"sign-up",
] as const;

export const AUTH_CLASS_KEYWORDS = ["signin", "login", "auth"] as const;

export const DASHBOARD_KEYWORDS = [
	"dashboard",
	"analytics",
	"metrics",
	"admin",
	"admin-panel",
	"control-panel",
	"admin panel",
	"control panel",
] as const;

/**
 * Keyword rules checked after auth, in order. `classKeywords` match the joined
 * class names, `roleKeywords` match section roles.
 */
export const SCREEN_KEYWORD_RULES: ReadonlyArray<{
	screenType: ScreenType;
	classKeywords: readonly string[];
	roleKeywords: readonly string[];
}> = [
	{ screenType: "services", classKeywords: ["service"], roleKeywords: ["service"] },
	{ screenType: "pricing", classKeywords: ["pricing"], roleKeywords: ["pricing"] },
	{ screenType: "portfolio", classKeywords: ["portfolio"], roleKeywords: ["portfolio"] },
	{ screenType: "blog", classKeywords: ["blog", "article"], roleKeywords: [] },
	{ screenType: "landing", classKeywords: ["landing"], roleKeywords: ["hero"] },
];

/** Attribute suffixes of data-* attributes that are test hooks, not components */
export const IGNORED_DATA_ATTRIBUTES: ReadonlySet<string> = new Set(["testid", "id", "cy", "qa"]);

export const REACT_COMPONENT_ATTRIBUTES = ["data-reactroot", "data-react-component", "data-component"] as const;

export const COMPONENT_CLASS_TOKENS = ["component", "widget"] as const;
