/**
 * @fileoverview Rule message templates
 *
 * Templates use `{{name}}` placeholders. Unknown placeholders are left as
 * written so typos stay visible in reports.
 *
 * @module @ontocheck/engine/execution/messageTemplate
 */

/**
 * Values available to a message template.
 */
export interface MessageValues {
    readonly value: unknown;
    readonly field: string;
    readonly property: string;
    readonly rule: string;
    readonly reason?: string;
}

/**
 * Render a raw field value for a message.
 *
 * Strings are used as-is, undefined becomes an empty string, everything
 * else is JSON encoded.
 */
export function formatValue(value: unknown): string {
    if (value === undefined) {
        return "";
    }
    if (typeof value === "string") {
        return value;
    }
    if (typeof value === "bigint") {
        return value.toString();
    }
    try {
        return JSON.stringify(value) ?? String(value);
    }
    catch {
        return String(value);
    }
}

/**
 * Substitute placeholders in a rule message.
 *
 * @example
 * ```typescript
 * renderMessage("Invalid date for {{field}}: {{value}}", {
 *     value: "02/31/1985", field: "birth_date", property: "...", rule: "valid-date",
 * });
 * // "Invalid date for birth_date: 02/31/1985"
 * ```
 */
export function renderMessage(template: string, values: MessageValues): string {
    return template.replace(/\{\{\s*(\w+)\s*\}\}/g, (placeholder: string, name: string) => {
        switch (name) {
            case "value":
                return formatValue(values.value);
            case "field":
                return values.field;
            case "property":
                return values.property;
            case "rule":
                return values.rule;
            case "reason":
                return values.reason ?? "";
            default:
                return placeholder;
        }
    });
}
