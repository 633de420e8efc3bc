/**
 * @fileoverview Built-in rule barrel exports
 *
 * @module @ontocheck/engine/rules
 */

export {
    requiredRule,
    patternRule,
    oneOfRule,
    rangeRule,
    lengthRule,
    dateRule,
    typeRule,
    parseCalendarDate,
    conformsToType,
    daysInMonth,
    isLeapYear,
    isAbsent,
    toNumber,
    type RuleDefinitionBase,
    type Bounds,
    type CalendarDate,
} from "./builtins.js";
