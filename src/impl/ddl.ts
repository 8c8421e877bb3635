/**
 * DDL generation from record type definitions.
 *
 * Produces a single CREATE TABLE statement: column definitions in
 * declaration order, then the primary key, foreign key and unique
 * constraints.
 */

import type {FieldMeta, ReferenceInfo, Table} from "./table.js";
import {SchemaError} from "./errors.js";

export interface DDLOptions {
	ifNotExists?: boolean;
}

/**
 * Generate a single column definition: `<name> <TYPE> NULL|NOT NULL[ UNIQUE]`.
 *
 * Nullability is always spelled out so the output does not depend on engine
 * defaults.
 */
export function generateColumnDDL(field: FieldMeta): string {
	let colDef = `${field.name} ${field.baseType}`;
	colDef += field.nullable ? " NULL" : " NOT NULL";

	// Relations never carry an inline UNIQUE
	if (field.unique && !field.reference) {
		colDef += " UNIQUE";
	}

	return colDef;
}

/**
 * Generate a foreign key clause. The delete policy is taken from this
 * reference alone.
 */
export function generateForeignKeyDDL(ref: ReferenceInfo): string {
	return (
		`FOREIGN KEY(${ref.fieldName}) REFERENCES ` +
		`${ref.table.name}(${ref.referencedField}) ON DELETE ${ref.onDelete}`
	);
}

/**
 * Generate CREATE TABLE DDL for a record type.
 *
 * @throws SchemaError if the table has no name or no columns
 *
 * @example
 * generateDDL(Departments)
 * // → CREATE TABLE IF NOT EXISTS departments (id INTEGER NOT NULL,
 * //   name TEXT NOT NULL UNIQUE, budget REAL NULL, PRIMARY KEY (id), UNIQUE(name))
 */
export function generateDDL<T extends Table>(
	table: T,
	options: DDLOptions = {},
): string {
	const {ifNotExists = true} = options;

	if (!table.name) {
		throw new SchemaError("Cannot create a table without a name");
	}

	const columns = table.fields();
	if (columns.length === 0) {
		throw new SchemaError(
			`Table "${table.name}" declares no columns`,
			table.name,
		);
	}

	const clauses: string[] = columns.map(generateColumnDDL);

	if (table.meta.primary !== null) {
		clauses.push(`PRIMARY KEY (${table.meta.primary})`);
	}

	for (const ref of table.references()) {
		clauses.push(generateForeignKeyDDL(ref));
	}

	for (const col of table.meta.unique) {
		clauses.push(`UNIQUE(${col})`);
	}

	const exists = ifNotExists ? "IF NOT EXISTS " : "";
	return `CREATE TABLE ${exists}${table.name} (${clauses.join(", ")})`;
}
