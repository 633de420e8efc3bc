/**
 * @fileoverview Configuration module exports
 *
 * @module config
 */

export {
    loadSettings,
    settingsFromEnv,
    formatIssues,
    SettingsSchema,
    type Settings,
    type SettingsEnv,
} from "./loadSettings.js";
export { loadOntology, parseOntology } from "./loadOntology.js";
export { loadMapping } from "./loadMapping.js";
