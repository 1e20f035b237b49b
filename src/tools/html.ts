/*
 * Regex-level HTML helpers for fetched pages and generated landing pages.
 * Selectors support a bare tag, `#id` or `.class`; nested elements of the
 * same tag are not balanced.
 */

const ENTITIES: Record<string, string> = {
    "&amp;": "&",
    "&lt;": "<",
    "&gt;": ">",
    "&quot;": '"',
    "&#39;": "'",
    "&nbsp;": " ",
}

export function escapeHtml(value: string): string {
    return value
        .replace(/&/g, "&amp;")
        .replace(/</g, "&lt;")
        .replace(/>/g, "&gt;")
        .replace(/"/g, "&quot;")
        .replace(/'/g, "&#39;")
}

function decodeEntities(value: string): string {
    return value.replace(/&(?:amp|lt|gt|quot|#39|nbsp);/g, (m) => ENTITIES[m] ?? m)
}

export function extractTitle(html: string): string | null {
    const match = /<title[^>]*>([\s\S]*?)<\/title>/i.exec(html)
    const title = match?.[1]?.trim()
    return title ? decodeEntities(title) : null
}

export function stripTags(html: string): string {
    return decodeEntities(
        html
            .replace(/<(script|style|noscript)\b[\s\S]*?<\/\1>/gi, " ")
            .replace(/<!--[\s\S]*?-->/g, " ")
            .replace(/<br\s*\/?>/gi, "\n")
            .replace(/<\/(p|div|li|h[1-6]|section|article|tr)>/gi, "\n")
            .replace(/<[^>]+>/g, " ")
    )
        .replace(/[ \t]+/g, " ")
        .replace(/\s*\n\s*/g, "\n")
        .trim()
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

/** Inner HTML of every element matching a tag, `#id` or `.class` selector. */
export function selectElements(html: string, selector: string): string[] {
    const trimmed = selector.trim()
    let pattern: RegExp
    if (trimmed.startsWith("#")) {
        const id = escapeRegExp(trimmed.slice(1))
        pattern = new RegExp(
            `<([a-z][a-z0-9]*)\\b[^>]*\\bid=["']${id}["'][^>]*>([\\s\\S]*?)<\\/\\1>`,
            "gi"
        )
    } else if (trimmed.startsWith(".")) {
        const cls = escapeRegExp(trimmed.slice(1))
        pattern = new RegExp(
            `<([a-z][a-z0-9]*)\\b[^>]*\\bclass=["'][^"']*\\b${cls}\\b[^"']*["'][^>]*>([\\s\\S]*?)<\\/\\1>`,
            "gi"
        )
    } else if (/^[a-z][a-z0-9]*$/i.test(trimmed)) {
        pattern = new RegExp(
            `<(${trimmed})\\b[^>]*>([\\s\\S]*?)<\\/\\1>`,
            "gi"
        )
    } else {
        return []
    }
    return [...html.matchAll(pattern)].map((match) => match[2] ?? "")
}

export type PageTheme = "light" | "dark"

export function isPageTheme(value: unknown): value is PageTheme {
    return value === "light" || value === "dark"
}

function titleCase(key: string): string {
    return key
        .split("_")
        .filter(Boolean)
        .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
        .join(" ")
}

function displayValue(value: unknown): string {
    if (typeof value === "string") return value
    if (typeof value === "number" || typeof value === "boolean") {
        return String(value)
    }
    return JSON.stringify(value)
}

function renderValue(value: unknown): string {
    if (Array.isArray(value)) {
        const items = value
            .map((item) => `<li>${escapeHtml(displayValue(item))}</li>`)
            .join("\n")
        return `<ul>\n${items}\n</ul>`
    }
    if (typeof value === "object" && value !== null) {
        return Object.entries(value)
            .map(
                ([key, inner]) =>
                    `<h3>${escapeHtml(titleCase(key))}</h3>\n${renderValue(inner)}`
            )
            .join("\n")
    }
    return `<p>${escapeHtml(displayValue(value))}</p>`
}

/** Fills `{key}` placeholders; list values are joined with ", ". */
export function fillTemplate(
    template: string,
    data: Record<string, unknown>
): string {
    let html = template
    for (const [key, value] of Object.entries(data)) {
        const text = Array.isArray(value)
            ? value.map(displayValue).join(", ")
            : displayValue(value)
        html = html.split(`{${key}}`).join(escapeHtml(text))
    }
    return html
}

export function renderPage(
    data: Record<string, unknown>,
    theme: PageTheme = "light"
): string {
    const title = escapeHtml(
        typeof data.title === "string" && data.title ? data.title : "Generated Page"
    )
    const [headerBg, headingColour, bodyBg, bodyColour] =
        theme === "dark"
            ? ["#333", "#f4f4f4", "#1e1e1e", "#e0e0e0"]
            : ["#f4f4f4", "#333", "#ffffff", "#222"]

    const sections = Object.entries(data)
        .filter(([key]) => key !== "title")
        .map(
            ([key, value]) =>
                `<section id="${escapeHtml(key)}">\n<h2>${escapeHtml(titleCase(key))}</h2>\n${renderValue(value)}\n</section>`
        )
        .join("\n")

    return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${title}</title>
<style>
body { font-family: Arial, sans-serif; line-height: 1.6; margin: 0; background: ${bodyBg}; color: ${bodyColour}; }
.container { width: 80%; margin: 0 auto; padding: 20px; }
header { background-color: ${headerBg}; padding: 1rem; }
h1, h2, h3 { color: ${headingColour}; }
section { margin-bottom: 20px; }
</style>
</head>
<body>
<header><div class="container"><h1>${title}</h1></div></header>
<div class="container">
${sections}
</div>
</body>
</html>
`
}
