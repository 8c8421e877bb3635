/**
 * Structured error types for mapping and persistence operations.
 *
 * All errors extend DatabaseError, which includes an error code
 * for programmatic error handling.
 */

// ============================================================================
// Error Codes
// ============================================================================

export type DatabaseErrorCode =
	| "SCHEMA_ERROR"
	| "ATTRIBUTE_ERROR"
	| "PERSISTENCE_ERROR"
	| "QUERY_ERROR"
	| "CONSTRAINT_VIOLATION"
	| "CONNECTION_ERROR";

// ============================================================================
// Base Error
// ============================================================================

/**
 * Base error class for all database errors.
 *
 * Includes an error code for programmatic handling.
 */
export class DatabaseError extends Error {
	readonly code: DatabaseErrorCode;

	constructor(
		code: DatabaseErrorCode,
		message: string,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = "DatabaseError";
		this.code = code;

		// Maintains proper stack trace in V8 environments
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}
}

// ============================================================================
// Specific Error Types
// ============================================================================

/**
 * Thrown when a record type cannot be declared or compiled: missing table
 * name, no columns, more than one primary key, a column type that cannot be
 * inferred.
 */
export class SchemaError extends DatabaseError {
	readonly tableName?: string;
	readonly fieldName?: string;

	constructor(
		message: string,
		tableName?: string,
		fieldName?: string,
		options?: ErrorOptions,
	) {
		super("SCHEMA_ERROR", message, options);
		this.name = "SchemaError";
		this.tableName = tableName;
		this.fieldName = fieldName;
	}
}

/**
 * Thrown when reading or writing an attribute the record type does not declare.
 */
export class AttributeError extends DatabaseError {
	readonly tableName: string;
	readonly attribute: string;

	constructor(tableName: string, attribute: string, options?: ErrorOptions) {
		super(
			"ATTRIBUTE_ERROR",
			`"${tableName}" has no attribute "${attribute}"`,
			options,
		);
		this.name = "AttributeError";
		this.tableName = tableName;
		this.attribute = attribute;
	}
}

/**
 * Thrown when save() or delete() lacks the table binding or primary key it
 * needs.
 */
export class PersistenceError extends DatabaseError {
	readonly tableName?: string;

	constructor(message: string, tableName?: string, options?: ErrorOptions) {
		super("PERSISTENCE_ERROR", message, options);
		this.name = "PersistenceError";
		this.tableName = tableName;
	}
}

/**
 * Thrown when a query fails.
 */
export class QueryError extends DatabaseError {
	readonly sql?: string;

	constructor(message: string, sql?: string, options?: ErrorOptions) {
		super("QUERY_ERROR", message, options);
		this.name = "QueryError";
		this.sql = sql;
	}
}

export type ConstraintKind =
	| "unique"
	| "foreign_key"
	| "check"
	| "not_null"
	| "primary_key"
	| "unknown";

/**
 * Thrown when a database constraint is violated.
 *
 * Constraint violations are detected by the engine and converted from
 * driver-specific errors into this normalized format. The original error is
 * kept as `cause`.
 */
export class ConstraintViolationError extends DatabaseError {
	/**
	 * Type of constraint that was violated.
	 * "unknown" if the specific type couldn't be determined from the error.
	 */
	readonly kind: ConstraintKind;

	/**
	 * Name of the constraint as reported by the engine (e.g. "users.email").
	 */
	readonly constraint?: string;

	readonly table?: string;

	readonly column?: string;

	constructor(
		message: string,
		details: {
			kind: ConstraintKind;
			constraint?: string;
			table?: string;
			column?: string;
		},
		options?: ErrorOptions,
	) {
		super("CONSTRAINT_VIOLATION", message, options);
		this.name = "ConstraintViolationError";
		this.kind = details.kind;
		this.constraint = details.constraint;
		this.table = details.table;
		this.column = details.column;
	}
}

/**
 * Thrown when the database cannot be opened or is used after close().
 */
export class ConnectionError extends DatabaseError {
	constructor(message: string, options?: ErrorOptions) {
		super("CONNECTION_ERROR", message, options);
		this.name = "ConnectionError";
	}
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if an error is a DatabaseError.
 */
export function isDatabaseError(error: unknown): error is DatabaseError {
	return error instanceof DatabaseError;
}

/**
 * Check if an error has a specific error code.
 */
export function hasErrorCode(
	error: unknown,
	code: DatabaseErrorCode,
): error is DatabaseError {
	return isDatabaseError(error) && error.code === code;
}
