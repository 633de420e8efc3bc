/**
 * @fileoverview Rule loader barrel exports
 *
 * @module @ontocheck/engine/plugins
 */

export {
    RuleLoader,
    createRuleFromYaml,
    parseYamlRuleDefinition,
    type YamlRuleDefinition,
    type YamlCheck,
    type LoadedRules,
    type RuleLoadFailure,
    type RuleLoaderConfig,
} from "./RuleLoader.js";
