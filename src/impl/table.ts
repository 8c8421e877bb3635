/**
 * Record type definitions with wrapper-based field extensions.
 *
 * Field types come from Zod schemas. Wrappers (primary, unique, columnType,
 * references) attach column metadata without touching Zod internals, and the
 * metadata is extracted once at table() call time.
 */

import {z, type ZodTypeAny} from "zod";
import {SchemaError} from "./errors.js";

// ============================================================================
// Field Wrappers
// ============================================================================

export type BaseType = "INTEGER" | "REAL" | "TEXT" | "BLOB";

const DB_FIELD = Symbol.for("rowkit:field");

export interface FieldDBMeta {
	primaryKey?: boolean;
	unique?: boolean;
	/** Explicit column type; inferred from the schema when absent. */
	type?: BaseType;
	reference?: {
		table: Table;
		nullable: boolean;
	};
}

export interface FieldWrapper<S extends ZodTypeAny = ZodTypeAny> {
	readonly [DB_FIELD]: true;
	readonly schema: S;
	readonly meta: FieldDBMeta;
}

export type FieldInput = ZodTypeAny | FieldWrapper;

export type Fields = Record<string, FieldInput>;

export function isFieldWrapper(value: unknown): value is FieldWrapper {
	return (
		value !== null &&
		typeof value === "object" &&
		DB_FIELD in value &&
		value[DB_FIELD] === true
	);
}

function wrap<S extends ZodTypeAny>(
	field: S | FieldWrapper<S>,
	meta: FieldDBMeta,
): FieldWrapper<S> {
	if (isFieldWrapper(field)) {
		return {
			[DB_FIELD]: true,
			schema: field.schema,
			meta: {...field.meta, ...meta},
		};
	}

	return {[DB_FIELD]: true, schema: field, meta};
}

/**
 * Mark a field as the primary key.
 *
 * @example
 * id: primary(z.number().int())
 */
export function primary<S extends ZodTypeAny>(
	field: S | FieldWrapper<S>,
): FieldWrapper<S> {
	return wrap(field, {primaryKey: true});
}

/**
 * Mark a field as unique.
 *
 * @example
 * email: unique(z.string())
 */
export function unique<S extends ZodTypeAny>(
	field: S | FieldWrapper<S>,
): FieldWrapper<S> {
	return wrap(field, {unique: true});
}

/**
 * Give a field an explicit column type. Required for schemas whose storage
 * type cannot be inferred, such as binary data.
 *
 * @example
 * avatar: columnType(z.instanceof(Buffer).nullable(), "BLOB")
 */
export function columnType<S extends ZodTypeAny>(
	field: S | FieldWrapper<S>,
	type: BaseType,
): FieldWrapper<S> {
	return wrap(field, {type});
}

export interface ReferenceOptions {
	/**
	 * Whether the column may hold NULL. Also picks the delete policy:
	 * nullable references are set to NULL, required ones cascade.
	 */
	nullable?: boolean;
}

/**
 * Define a foreign key to another record type's primary key. The column is
 * always an INTEGER.
 *
 * @example
 * department_id: references(Departments)
 * mentor_id: references(Employees, {nullable: true})
 */
export function references(
	table: Table,
	options?: {nullable?: false},
): FieldWrapper<z.ZodNumber>;
export function references(
	table: Table,
	options: {nullable: true},
): FieldWrapper<z.ZodNullable<z.ZodNumber>>;
export function references(
	table: Table,
	options?: ReferenceOptions,
): FieldWrapper<z.ZodNumber> | FieldWrapper<z.ZodNullable<z.ZodNumber>>;
export function references(
	table: Table,
	options: ReferenceOptions = {},
): FieldWrapper<z.ZodNumber> | FieldWrapper<z.ZodNullable<z.ZodNumber>> {
	const nullable = options.nullable ?? false;
	const meta: FieldDBMeta = {type: "INTEGER", reference: {table, nullable}};
	return nullable
		? wrap(z.number().int().nullable(), meta)
		: wrap(z.number().int(), meta);
}

// ============================================================================
// Field Metadata
// ============================================================================

/**
 * How a stored value is turned back into the field's JS type.
 */
export type FieldKind =
	| "integer"
	| "real"
	| "text"
	| "blob"
	| "boolean"
	| "bigint";

export type OnDelete = "CASCADE" | "SET NULL";

export interface ReferenceInfo {
	fieldName: string;
	table: Table;
	referencedField: string;
	nullable: boolean;
	onDelete: OnDelete;
}

/**
 * Column descriptor extracted from a field declaration.
 */
export interface FieldMeta {
	readonly name: string;
	readonly baseType: BaseType;
	readonly kind: FieldKind;
	readonly primaryKey: boolean;
	readonly nullable: boolean;
	readonly unique: boolean;
	readonly reference?: ReferenceInfo;
}

export interface TableMeta {
	/** Name of the field marked primary, or null when the `id` convention applies */
	primary: string | null;
	unique: string[];
	references: ReferenceInfo[];
	/** Columns in declaration order */
	columns: FieldMeta[];
}

// ============================================================================
// Type Mapping
// ============================================================================

interface UnwrapResult {
	core: ZodTypeAny;
	nullable: boolean;
}

/**
 * Unwrap optional, nullable, default and effect layers.
 */
function unwrapType(schema: ZodTypeAny): UnwrapResult {
	let core = schema;
	let nullable = false;

	while (true) {
		if (core instanceof z.ZodOptional || core instanceof z.ZodNullable) {
			nullable = true;
			core = core.unwrap();
			continue;
		}

		if (core instanceof z.ZodDefault) {
			nullable = true;
			core = core.removeDefault();
			continue;
		}

		if (core instanceof z.ZodEffects) {
			core = core.innerType();
			continue;
		}

		if (core instanceof z.ZodBranded) {
			core = core.unwrap();
			continue;
		}

		break;
	}

	return {core, nullable};
}

function inferKind(core: ZodTypeAny): FieldKind | null {
	if (core instanceof z.ZodString || core instanceof z.ZodEnum) {
		return "text";
	}
	if (core instanceof z.ZodNumber) {
		return core.isInt ? "integer" : "real";
	}
	if (core instanceof z.ZodBigInt) {
		return "bigint";
	}
	if (core instanceof z.ZodBoolean) {
		return "boolean";
	}
	if (core instanceof z.ZodLiteral) {
		switch (typeof core.value) {
			case "string":
				return "text";
			case "number":
				return Number.isInteger(core.value) ? "integer" : "real";
			case "boolean":
				return "boolean";
		}
	}
	return null;
}

const KIND_TYPES: Record<FieldKind, BaseType> = {
	integer: "INTEGER",
	real: "REAL",
	text: "TEXT",
	blob: "BLOB",
	boolean: "INTEGER",
	bigint: "INTEGER",
};

const TYPE_KINDS: Record<BaseType, FieldKind> = {
	INTEGER: "integer",
	REAL: "real",
	TEXT: "text",
	BLOB: "blob",
};

function resolveColumn(
	tableName: string,
	fieldName: string,
	schema: ZodTypeAny,
	meta: FieldDBMeta,
): {baseType: BaseType; kind: FieldKind; nullable: boolean} {
	const {core, nullable} = unwrapType(schema);
	const inferred = inferKind(core);

	if (meta.type) {
		// An explicit type wins; keep the schema's kind only when it agrees.
		const kind =
			inferred && KIND_TYPES[inferred] === meta.type
				? inferred
				: TYPE_KINDS[meta.type];
		return {baseType: meta.type, kind, nullable};
	}

	if (!inferred) {
		throw new SchemaError(
			`Cannot infer a column type for "${tableName}.${fieldName}"; wrap it with columnType()`,
			tableName,
			fieldName,
		);
	}

	return {baseType: KIND_TYPES[inferred], kind: inferred, nullable};
}

// ============================================================================
// Identifier Validation
// ============================================================================

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Identifiers are written into SQL unquoted, so only plain names are allowed.
 * An empty table name is accepted here and rejected when compiling or saving.
 */
function validateIdentifier(
	name: string,
	type: "table" | "column",
	tableName: string,
): void {
	if (type === "table" && name === "") {
		return;
	}

	if (!IDENTIFIER.test(name)) {
		throw new SchemaError(
			`Invalid ${type} identifier "${name}": ${type} names must match ${IDENTIFIER}`,
			tableName,
			type === "column" ? name : undefined,
		);
	}
}

// ============================================================================
// Table
// ============================================================================

const TABLE_MARKER = Symbol.for("rowkit:table");

type OutputOf<I> =
	I extends FieldWrapper<infer S>
		? z.output<S>
		: I extends ZodTypeAny
			? z.output<I>
			: never;

/**
 * Row shape of a field declaration object.
 */
export type RowOf<F extends Fields> = {
	[K in keyof F]: OutputOf<F[K]>;
};

export interface Table<F extends Fields = Fields> {
	readonly [TABLE_MARKER]: true;
	readonly name: string;

	/** The field declarations as passed to table() */
	readonly definition: F;

	/** Pre-extracted metadata (no Zod walking needed) */
	readonly meta: TableMeta;

	/** Primary key column: the field marked primary, else `id` */
	primaryKey(): string;

	/** Column descriptors in declaration order */
	fields(): readonly FieldMeta[];

	/** Look up one column descriptor */
	field(name: string): FieldMeta | undefined;

	/** All foreign key references, in declaration order */
	references(): readonly ReferenceInfo[];
}

/**
 * Row type of a table.
 */
export type Row<T extends Table> = T extends Table<infer F> ? RowOf<F> : never;

/**
 * Values accepted when creating a record: every field is optional.
 */
export type Insert<T extends Table> = Partial<Row<T>>;

export type FieldName<T extends Table> = keyof Row<T> & string;

/**
 * Check if a value is a Table object.
 */
export function isTable(value: unknown): value is Table {
	return (
		value !== null &&
		typeof value === "object" &&
		TABLE_MARKER in value &&
		value[TABLE_MARKER] === true
	);
}

/**
 * Define a record type.
 *
 * Attribute order is declaration order, and it is the column order of the
 * generated DDL.
 *
 * @example
 * const Departments = table("departments", {
 *   id: primary(z.number().int()),
 *   name: unique(z.string()),
 *   budget: z.number().nullable(),
 * });
 */
export function table<F extends Fields>(name: string, fields: F): Table<F> {
	validateIdentifier(name, "table", name);

	const meta: TableMeta = {
		primary: null,
		unique: [],
		references: [],
		columns: [],
	};

	for (const [key, value] of Object.entries(fields)) {
		validateIdentifier(key, "column", name);

		const schema = isFieldWrapper(value) ? value.schema : value;
		const dbMeta: FieldDBMeta = isFieldWrapper(value) ? value.meta : {};
		const {baseType, kind, nullable} = resolveColumn(name, key, schema, dbMeta);
		const primaryKey = dbMeta.primaryKey === true;

		if (primaryKey) {
			if (meta.primary !== null) {
				throw new SchemaError(
					`Ambiguous primary key in "${name}": both "${meta.primary}" and "${key}" are marked primary`,
					name,
					key,
				);
			}
			meta.primary = key;
		}

		const isUnique = dbMeta.unique === true && !primaryKey;
		if (isUnique) {
			meta.unique.push(key);
		}

		let reference: ReferenceInfo | undefined;
		if (dbMeta.reference) {
			const {table: target, nullable: refNullable} = dbMeta.reference;
			reference = {
				fieldName: key,
				table: target,
				referencedField: target.primaryKey(),
				nullable: refNullable,
				onDelete: refNullable ? "SET NULL" : "CASCADE",
			};
			meta.references.push(reference);
		}

		meta.columns.push({
			name: key,
			baseType,
			kind,
			primaryKey,
			nullable,
			unique: dbMeta.unique === true,
			reference,
		});
	}

	const byName = new Map(meta.columns.map((col) => [col.name, col]));

	// Records are addressed by their key; a table with no columns is rejected
	// when compiled.
	if (meta.primary === null && meta.columns.length > 0 && !byName.has("id")) {
		throw new SchemaError(
			`Table "${name}" has no primary key: mark a field with primary() or declare an "id" field`,
			name,
		);
	}

	return {
		[TABLE_MARKER]: true,
		name,
		definition: fields,
		meta,
		primaryKey() {
			return meta.primary ?? "id";
		},
		fields() {
			return meta.columns;
		},
		field(fieldName: string) {
			return byName.get(fieldName);
		},
		references() {
			return meta.references;
		},
	};
}

// ============================================================================
// Decoding
// ============================================================================

/**
 * Convert a stored value back to the JS type its field declares.
 *
 * SQLite hands back integers for booleans and numbers for bigints (unless the
 * driver runs in safe-integers mode); everything else passes through.
 */
export function decodeValue(value: unknown, field: FieldMeta): unknown {
	if (value === null || value === undefined) {
		return value;
	}

	switch (field.kind) {
		case "boolean":
			return typeof value === "number" || typeof value === "bigint"
				? value !== 0 && value !== 0n
				: value;
		case "bigint":
			return typeof value === "number" ? BigInt(value) : value;
		case "integer":
		case "real":
			return typeof value === "bigint" ? Number(value) : value;
		default:
			return value;
	}
}

/**
 * Decode every declared column of a storage row. Columns the table does not
 * declare (joined or computed ones) are copied unchanged.
 */
export function decodeRow(
	table: Table,
	row: Record<string, unknown>,
): Map<string, unknown> {
	const values = new Map<string, unknown>();
	for (const [key, value] of Object.entries(row)) {
		const field = table.field(key);
		values.set(key, field ? decodeValue(value, field) : decodeLoose(value));
	}
	return values;
}

/**
 * Undeclared integers arrive as bigints from drivers in safe-integers mode;
 * they read as numbers unless that would lose precision.
 */
function decodeLoose(value: unknown): unknown {
	if (typeof value === "bigint") {
		const n = Number(value);
		return Number.isSafeInteger(n) ? n : value;
	}
	return value;
}
