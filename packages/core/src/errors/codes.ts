/**
 * @fileoverview Error codes for crossbuild
 *
 * Error codes are organized by category using numeric ranges:
 * - 1000-1099: Configuration errors
 * - 2000-2099: Target errors
 * - 3000-3099: Template errors
 * - 4000-4099: Entry point errors
 * - 5000-5099: Toolchain errors
 */

/**
 * Error codes for every failure the build core reports
 * Using regular enum for compatibility with isolatedModules
 */
export enum BuildErrorCode {
  // Configuration errors (1000-1099)
  InvalidConfig = 1000,
  ConfigNotFound = 1001,

  // Target errors (2000-2099)
  InvalidTarget = 2000,

  // Template errors (3000-3099)
  TemplateParse = 3000,
  TemplateExecution = 3001,

  // Entry point errors (4000-4099)
  MissingEntryPoint = 4000,
  FileResolution = 4001,

  // Toolchain errors (5000-5099)
  ToolchainFailed = 5000,
}

/**
 * Error categories, one per failure kind a caller has to tell apart
 */
export enum ErrorCategory {
  Configuration = 'configuration',
  Target = 'target',
  Template = 'template',
  EntryPoint = 'entry-point',
  Toolchain = 'toolchain',
}

/**
 * Mapping of error codes to categories
 */
export const ERROR_CATEGORIES: Record<BuildErrorCode, ErrorCategory> = {
  [BuildErrorCode.InvalidConfig]: ErrorCategory.Configuration,
  [BuildErrorCode.ConfigNotFound]: ErrorCategory.Configuration,

  [BuildErrorCode.InvalidTarget]: ErrorCategory.Target,

  [BuildErrorCode.TemplateParse]: ErrorCategory.Template,
  [BuildErrorCode.TemplateExecution]: ErrorCategory.Template,

  [BuildErrorCode.MissingEntryPoint]: ErrorCategory.EntryPoint,
  [BuildErrorCode.FileResolution]: ErrorCategory.EntryPoint,

  [BuildErrorCode.ToolchainFailed]: ErrorCategory.Toolchain,
};

/**
 * Helper function to get the category for an error code
 */
export function getErrorCategory(code: BuildErrorCode): ErrorCategory {
  return ERROR_CATEGORIES[code];
}

/**
 * Helper function to check if an error code is in a specific category
 */
export function isErrorInCategory(code: BuildErrorCode, category: ErrorCategory): boolean {
  return getErrorCategory(code) === category;
}

/**
 * Get all error codes in a specific category
 */
export function getErrorCodesInCategory(category: ErrorCategory): BuildErrorCode[] {
  return Object.values(BuildErrorCode)
    .filter((code): code is BuildErrorCode => typeof code === 'number')
    .filter(code => ERROR_CATEGORIES[code] === category);
}
