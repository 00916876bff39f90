/**
 * @fileoverview Error codes for the lifeguard resource lifecycle library
 *
 * Error codes are organized by category using numeric ranges:
 * - 1000-1099: Lifecycle errors (acquisition, operations, release)
 * - 8000-8099: Configuration errors
 * - 9000-9099: General errors
 */

/**
 * Error codes for all resource lifecycle operations
 * Using regular enum for compatibility with isolatedModules
 */
export enum ResourceErrorCode {
  // Lifecycle errors (1000-1099)
  AcquisitionFailed = 1000,
  InvalidOperation = 1001,
  ReleaseFailed = 1002,
  OperationFailed = 1003,
  UseAfterRelease = 1004,

  // Configuration errors (8000-8099)
  ConfigInvalid = 8000,

  // General errors (9000-9099)
  Unknown = 9000,
  InternalError = 9001,
}

/**
 * Error categories for grouping related errors
 */
export enum ErrorCategory {
  Lifecycle = 'lifecycle',
  Configuration = 'configuration',
  General = 'general',
}

/**
 * Mapping of error codes to their categories
 */
const ERROR_CATEGORIES: Record<ResourceErrorCode, ErrorCategory> = {
  [ResourceErrorCode.AcquisitionFailed]: ErrorCategory.Lifecycle,
  [ResourceErrorCode.InvalidOperation]: ErrorCategory.Lifecycle,
  [ResourceErrorCode.ReleaseFailed]: ErrorCategory.Lifecycle,
  [ResourceErrorCode.OperationFailed]: ErrorCategory.Lifecycle,
  [ResourceErrorCode.UseAfterRelease]: ErrorCategory.Lifecycle,

  [ResourceErrorCode.ConfigInvalid]: ErrorCategory.Configuration,

  [ResourceErrorCode.Unknown]: ErrorCategory.General,
  [ResourceErrorCode.InternalError]: ErrorCategory.General,
};

/**
 * Helper function to get the category for an error code
 */
export function getErrorCategory(code: ResourceErrorCode): ErrorCategory {
  return ERROR_CATEGORIES[code] ?? ErrorCategory.General;
}

/**
 * Helper function to check if an error code is in a specific category
 */
export function isErrorInCategory(code: ResourceErrorCode, category: ErrorCategory): boolean {
  return getErrorCategory(code) === category;
}

/**
 * Get all error codes in a specific category
 */
export function getErrorCodesInCategory(category: ErrorCategory): ResourceErrorCode[] {
  return Object.keys(ERROR_CATEGORIES)
    .map(Number)
    .filter((code): code is ResourceErrorCode => code in ResourceErrorCode)
    .filter((code) => ERROR_CATEGORIES[code] === category);
}
