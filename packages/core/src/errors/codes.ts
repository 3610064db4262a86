/**
 * @fileoverview Error codes for SalesBook
 *
 * Error codes are organized by category using numeric ranges:
 * - 1000-1099: Validation errors (malformed value object input)
 * - 2000-2099: Parse errors (command text that cannot be turned into a command)
 * - 3000-3099: Command errors (valid syntax, invalid state)
 * - 4000-4099: Not found errors (referenced record or tag absent)
 * - 5000-5099: Storage errors
 * - 9000-9099: General errors
 */

/**
 * Error codes for all address book operations
 * Using regular enum for compatibility with isolatedModules
 */
export enum AddressBookErrorCode {
  // Validation errors (1000-1099)
  InvalidName = 1000,
  InvalidPhone = 1001,
  InvalidEmail = 1002,
  InvalidAddress = 1003,
  InvalidRemark = 1004,
  InvalidMessage = 1005,
  InvalidItemName = 1006,
  InvalidTagName = 1007,
  InvalidUnitPrice = 1008,
  InvalidQuantity = 1009,
  InvalidDateTime = 1010,
  InvalidDuration = 1011,
  InvalidIndex = 1012,
  InvalidMonthAndYear = 1013,
  InvalidCount = 1014,
  InvalidConfig = 1015,

  // Parse errors (2000-2099)
  UnknownCommand = 2000,
  InvalidCommandFormat = 2001,
  MissingPrefix = 2002,
  UnexpectedPreamble = 2003,
  InvalidFieldValue = 2004,
  NoFieldEdited = 2005,
  DuplicateCommandWord = 2006,
  DuplicateGroup = 2007,

  // Command errors (3000-3099)
  IndexOutOfRange = 3000,
  DuplicateRecord = 3001,
  DuplicateTag = 3002,
  InvalidState = 3003,

  // Not found errors (4000-4099)
  RecordNotFound = 4000,
  TagNotFound = 4001,

  // Storage errors (5000-5099)
  SnapshotCorrupted = 5000,
  StorageLoadFailed = 5001,
  StorageSaveFailed = 5002,

  // General errors (9000-9099)
  Unknown = 9000,
  InternalError = 9001,
}

/**
 * Error categories for grouping related error codes
 */
export enum ErrorCategory {
  Validation = 'Validation',
  Parse = 'Parse',
  Command = 'Command',
  NotFound = 'NotFound',
  Storage = 'Storage',
  General = 'General',
}

const CATEGORY_BY_RANGE: Record<number, ErrorCategory> = {
  1: ErrorCategory.Validation,
  2: ErrorCategory.Parse,
  3: ErrorCategory.Command,
  4: ErrorCategory.NotFound,
  5: ErrorCategory.Storage,
};

/**
 * Get the category for an error code from its numeric range
 */
export function getErrorCategory(code: AddressBookErrorCode): ErrorCategory {
  return CATEGORY_BY_RANGE[Math.floor(code / 1000)] ?? ErrorCategory.General;
}

