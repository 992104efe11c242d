// CHANGE: Central export file for shared type definitions
// WHY: Provides a single import point for types used across layers

export type { CLIOptions, ModeFlags } from "./config.js";
