/**
 * rowkit - a small object-relational mapper
 *
 * Declare record types. Save records. Query with raw SQL fragments.
 */

// ============================================================================
// Record Types
// ============================================================================

export {
	// Functions
	table,
	primary,
	unique,
	columnType,
	references,

	// Type guards
	isTable,
	isFieldWrapper,

	// Table types
	type Table,
	type TableMeta,
	type Fields,
	type FieldInput,
	type FieldWrapper,
	type ReferenceOptions,

	// Row types
	type Row,
	type RowOf,
	type Insert,
	type FieldName,

	// Field types
	type BaseType,
	type FieldKind,
	type FieldMeta,
	type FieldDBMeta,
	type ReferenceInfo,
	type OnDelete,
} from "./impl/table.js";

// ============================================================================
// Schema Compiler
// ============================================================================

export {
	generateDDL,
	generateColumnDDL,
	generateForeignKeyDDL,
	type DDLOptions,
} from "./impl/ddl.js";

// ============================================================================
// Records and Queries
// ============================================================================

export {Entity, singular} from "./impl/record.js";

export {
	QueryBuilder,
	type JoinType,
	type OrderDirection,
	type ParsedQuery,
} from "./impl/query.js";

// ============================================================================
// Database
// ============================================================================

export {
	Database,
	QueryEvent,
	withDatabase,
	type Driver,
	type RawRow,
	type RunResult,
} from "./impl/database.js";

// ============================================================================
// Errors
// ============================================================================

export {
	// Base error
	DatabaseError,
	isDatabaseError,
	hasErrorCode,

	// Declaration errors
	SchemaError,
	AttributeError,

	// Persistence and query errors
	PersistenceError,
	QueryError,
	ConstraintViolationError,
	ConnectionError,

	// Error types
	type DatabaseErrorCode,
	type ConstraintKind,
} from "./impl/errors.js";
