/**
 * better-sqlite3 driver tests, run against in-memory databases.
 */

import {test, expect, describe, beforeEach, afterEach} from "vitest";
import {z} from "zod";
import SQLiteDriver from "./sqlite.js";
import {
	Database,
	table,
	primary,
	unique,
	columnType,
	references,
	ConnectionError,
	ConstraintViolationError,
	QueryError,
} from "./index.js";

const Departments = table("departments", {
	id: primary(z.number().int()),
	name: unique(z.string()),
	budget: z.number().nullable(),
});

const Employees = table("employees", {
	id: primary(z.number().int()),
	name: z.string(),
	salary: z.number().int(),
	active: z.boolean(),
	department_id: references(Departments, {nullable: true}),
});

const Assignments = table("assignments", {
	id: primary(z.number().int()),
	employee_id: references(Employees),
	role: z.string(),
});

let db: Database;

beforeEach(async () => {
	db = new Database(new SQLiteDriver(":memory:"));
	await db.createTable(Departments);
	await db.createTable(Employees);
	await db.createTable(Assignments);
});

afterEach(async () => {
	await db.close();
});

async function seed() {
	const it = db.create(Departments, {name: "IT", budget: 100000});
	const hr = db.create(Departments, {name: "HR", budget: 50000});
	await it.save();
	await hr.save();

	const ada = db.create(Employees, {
		name: "Ada",
		salary: 60000,
		active: true,
		department_id: it.get("id"),
	});
	const bob = db.create(Employees, {
		name: "Bob",
		salary: 40000,
		active: false,
		department_id: it.get("id"),
	});
	const cy = db.create(Employees, {
		name: "Cy",
		salary: 45000,
		active: true,
		department_id: hr.get("id"),
	});
	await ada.save();
	await bob.save();
	await cy.save();

	return {it, hr, ada, bob, cy};
}

describe("records", () => {
	test("insert assigns row ids", async () => {
		const {it, hr, cy} = await seed();

		expect(it.get("id")).toBe(1);
		expect(hr.get("id")).toBe(2);
		expect(cy.get("id")).toBe(3);
	});

	test("update persists only what changed", async () => {
		const {it} = await seed();

		it.set("budget", 120000);
		await it.save();

		const reloaded = await db.get(Departments, 1);
		expect(reloaded?.toJSON()).toEqual({id: 1, name: "IT", budget: 120000});
	});

	test("insert with default values", async () => {
		const Notes = table("notes", {
			id: primary(z.number().int()),
			body: z.string().nullable(),
		});
		await db.createTable(Notes);

		const note = db.create(Notes);
		await note.save();

		expect(note.get("id")).toBe(1);
		expect((await db.get(Notes, 1))?.get("body")).toBeNull();
	});

	test("values round-trip through their declared types", async () => {
		const Samples = table("samples", {
			id: primary(z.number().int()),
			label: z.string(),
			ratio: z.number(),
			big: z.bigint(),
			flag: z.boolean(),
			data: columnType(z.instanceof(Buffer), "BLOB"),
			note: z.string().nullable(),
		});
		await db.createTable(Samples);

		const sample = db.create(Samples, {
			label: "x",
			ratio: 0.25,
			big: 42n,
			flag: true,
			data: Buffer.from([1, 2, 3]),
			note: null,
		});
		await sample.save();

		const loaded = await db.get(Samples, sample.get("id"));
		expect(loaded?.get("label")).toBe("x");
		expect(loaded?.get("ratio")).toBe(0.25);
		expect(loaded?.get("big")).toBe(42n);
		expect(loaded?.get("flag")).toBe(true);
		expect(loaded?.get("data")).toEqual(Buffer.from([1, 2, 3]));
		expect(loaded?.get("note")).toBeNull();
	});

	test("bigints beyond 2^53 keep every digit", async () => {
		const Counters = table("counters", {
			id: primary(z.number().int()),
			value: z.bigint(),
		});
		await db.createTable(Counters);

		const counter = db.create(Counters, {value: 2n ** 60n + 1n});
		await counter.save();

		const loaded = await db.get(Counters, counter.get("id"));
		expect(loaded?.get("value")).toBe(1152921504606846977n);
		expect(loaded?.get("id")).toBe(1);
	});

	test("delete", async () => {
		const {bob} = await seed();

		expect(await bob.delete()).toBe(true);
		expect(await bob.delete()).toBe(false);
		expect(await db.get(Employees, 2)).toBeNull();
	});

	test("updating a row that is gone fails and stays dirty", async () => {
		const {bob} = await seed();
		const stale = await db.get(Employees, 2);
		await bob.delete();

		stale?.set("salary", 1);
		await expect(stale?.save()).rejects.toThrow(
			'No "employees" row with id = 2 to update',
		);
		expect(stale?.dirtyFields()).toEqual(["salary"]);
	});

	test("createTable is idempotent", async () => {
		await seed();
		await db.createTable(Departments);

		expect(await db.query(Departments).count()).toBe(2);
	});
});

describe("relations", () => {
	test("belongsTo and hasMany", async () => {
		const {it, bob} = await seed();

		const department = await bob.belongsTo(Departments);
		expect(department?.get("name")).toBe("IT");

		const staff = await it.hasMany(Employees);
		expect(staff.map((e) => e.get("name"))).toEqual(["Ada", "Bob"]);
	});

	test("deleting a parent nulls nullable references", async () => {
		const {it} = await seed();

		await it.delete();

		const orphans = await db
			.query(Employees)
			.where("department_id IS NULL")
			.orderBy("id")
			.all();
		expect(orphans.map((e) => e.get("name"))).toEqual(["Ada", "Bob"]);
		expect(await db.query(Employees).count()).toBe(3);
	});

	test("deleting a parent cascades to required references", async () => {
		const {ada, cy} = await seed();
		await db.create(Assignments, {employee_id: ada.get("id"), role: "lead"}).save();
		await db.create(Assignments, {employee_id: cy.get("id"), role: "dev"}).save();

		await cy.delete();

		const remaining = await db.query(Assignments).all();
		expect(remaining.map((a) => a.get("role"))).toEqual(["lead"]);
	});
});

describe("queries", () => {
	test("where, order and count", async () => {
		await seed();

		const query = db.query(Employees).where("salary > ?", 42000);
		expect(await query.count()).toBe(2);

		const names = (await query.orderBy("name", "DESC").all()).map((e) =>
			e.get("name"),
		);
		expect(names).toEqual(["Cy", "Ada"]);
	});

	test("count ignores limit and order", async () => {
		await seed();

		const count = await db
			.query(Employees)
			.where("active = ?", true)
			.orderBy("name")
			.limit(1)
			.count();

		expect(count).toBe(2);
	});

	test("limit and offset", async () => {
		await seed();

		const page = await db.query(Employees).orderBy("id").limit(1).offset(1).all();
		expect(page.map((e) => e.get("name"))).toEqual(["Bob"]);

		const rest = await db.query(Employees).orderBy("id").offset(2).all();
		expect(rest.map((e) => e.get("name"))).toEqual(["Cy"]);
	});

	test("first and exists", async () => {
		await seed();

		const lowest = await db.query(Employees).orderBy("salary").first();
		expect(lowest?.get("name")).toBe("Bob");
		expect(await db.query(Employees).where("name = ?", "Zed").first()).toBeNull();
		expect(await db.query(Employees).where("name = ?", "Zed").exists()).toBe(
			false,
		);
	});

	test("joined columns", async () => {
		await seed();

		const rows = await db
			.query(Employees)
			.select("employees.*", "departments.name AS department_name")
			.leftJoin("departments", "departments.id = employees.department_id")
			.orderBy("employees.id")
			.all();

		expect(rows.map((e) => e.column("department_name"))).toEqual([
			"IT",
			"IT",
			"HR",
		]);
		expect(rows[0].get("active")).toBe(true);
	});

	test("joined rows keep their own key and columns", async () => {
		await seed();

		const rows = await db
			.query(Employees)
			.join("departments", "departments.id = employees.department_id")
			.where("departments.name = ?", "HR")
			.all();

		expect(rows).toHaveLength(1);
		expect(rows[0].toJSON()).toEqual({
			id: 3,
			name: "Cy",
			salary: 45000,
			active: true,
			department_id: 2,
		});
	});

	test("group by and having", async () => {
		await seed();

		const groups = await db
			.query(Employees)
			.select("department_id", "COUNT(*) AS n")
			.groupBy("department_id")
			.having("COUNT(*) > ?", 1)
			.all();

		expect(groups).toHaveLength(1);
		expect(groups[0].get("department_id")).toBe(1);
		expect(groups[0].column("n")).toBe(2);
	});

	test("a malformed predicate raises QueryError", async () => {
		await seed();

		await expect(
			db.query(Employees).where("salary >>> ?", 1).all(),
		).rejects.toThrow(QueryError);
	});
});

describe("constraints", () => {
	test("unique violation", async () => {
		await seed();

		const error = await db
			.create(Departments, {name: "IT"})
			.save()
			.catch((err: unknown) => err);

		expect(error).toBeInstanceOf(ConstraintViolationError);
		expect(error).toMatchObject({
			kind: "unique",
			table: "departments",
			column: "name",
			constraint: "departments.name",
		});
	});

	test("foreign key violation", async () => {
		await seed();

		const error = await db
			.create(Employees, {
				name: "Dee",
				salary: 1,
				active: true,
				department_id: 99,
			})
			.save()
			.catch((err: unknown) => err);

		expect(error).toBeInstanceOf(ConstraintViolationError);
		expect(error).toMatchObject({kind: "foreign_key"});
	});

	test("not null violation", async () => {
		const record = db.create(Employees, {name: "Dee", salary: 1});

		await expect(record.save()).rejects.toMatchObject({kind: "not_null"});
		expect(record.isDirty()).toBe(true);
	});

	test("foreign keys can be switched off", async () => {
		const loose = new Database(
			new SQLiteDriver({url: ":memory:", foreignKeys: false}),
		);
		await loose.createTable(Departments);
		await loose.createTable(Employees);

		await loose
			.create(Employees, {
				name: "Dee",
				salary: 1,
				active: true,
				department_id: 99,
			})
			.save();

		expect(await loose.query(Employees).count()).toBe(1);
		await loose.close();
	});
});

describe("configuration", () => {
	test("invalid options raise ConnectionError", () => {
		expect(() => new SQLiteDriver({url: ""})).toThrow(ConnectionError);
		expect(() => new SQLiteDriver({url: ":memory:", timeout: -1})).toThrow(
			"Invalid SQLite options: timeout:",
		);
	});

	test("an unopenable path raises ConnectionError", () => {
		expect(
			() => new SQLiteDriver({url: "/nonexistent-dir/sub/app.db"}),
		).toThrow(ConnectionError);
	});
});
