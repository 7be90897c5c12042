/**
 * Common utilities — shared types, Result pattern, error handling.
 */

export { Ok, Err, unwrap, isOk, isErr, mapResult, attempt } from './result.js'
export type { Result } from './result.js'

export { BearingError, messageOf } from './errors.js'
export type { ErrorCode } from './errors.js'

export { parseStoredEnum, parseStoredInt } from './stored-values.js'

export { UUIDSchema, DateStringSchema, ColourSchema } from './schemas.js'

export { toBearingError, joinIssues, stripUndefined } from './repository-helpers.js'
