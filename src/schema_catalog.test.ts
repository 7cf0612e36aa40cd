import { describe, it, expect } from "vitest"
import { fileURLToPath } from "url"
import { SchemaCatalog, loadSchemaCatalog, parseSchemaCatalog } from "./schema_catalog.js"
import { ChatRouterError } from "./errors.js"

const catalogPath = fileURLToPath(new URL("../config/schema_catalog.yaml", import.meta.url))

describe("loadSchemaCatalog", () => {
	const catalog = loadSchemaCatalog(catalogPath)

	it("should know both tables", () => {
		expect(catalog.isKnownTable("chitalishte")).toBe(true)
		expect(catalog.isKnownTable("Information_Card")).toBe(true)
		expect(catalog.isKnownTable("reports")).toBe(false)
	})

	it("should answer column lookups case-insensitively", () => {
		expect(catalog.isKnownColumn("chitalishte", "region")).toBe(true)
		expect(catalog.isKnownColumn("CHITALISHTE", "Region")).toBe(true)
		expect(catalog.isKnownColumn("chitalishte", "employees_count")).toBe(false)
		expect(catalog.isKnownColumn("unknown_table", "id")).toBe(false)
	})

	it("should mark nullable columns per table", () => {
		expect(catalog.isNullable("information_card", "total_members_count")).toBe(true)
		expect(catalog.isNullable("information_card", "chitalishte_id")).toBe(false)
		expect(catalog.isNullable("chitalishte", "town")).toBe(true)
		expect(catalog.isNullable("chitalishte", "id")).toBe(false)
	})

	it("should expose text and composite columns", () => {
		expect(catalog.isTextColumn("region")).toBe(true)
		expect(catalog.isTextColumn("year")).toBe(false)
		expect(catalog.isCompositeTextColumn("town")).toBe(true)
		expect(catalog.isCompositeTextColumn("region")).toBe(false)
	})

	it("should correct known wrong column names", () => {
		expect(catalog.correctedColumnName("employee_count")).toBe("employees_count")
		expect(catalog.correctedColumnName("MEMBERS_COUNT")).toBe("total_members_count")
		expect(catalog.correctedColumnName("employees_count")).toBeUndefined()
	})

	it("should find the parent of a child table", () => {
		expect(catalog.relationForChild("information_card")).toEqual({
			parent: "chitalishte",
			parentKey: "id",
			child: "information_card",
			childKey: "chitalishte_id",
		})
		expect(catalog.relationForChild("chitalishte")).toBeUndefined()
	})

	it("should be immutable", () => {
		expect(Object.isFrozen(catalog)).toBe(true)
	})
})

describe("SchemaCatalog", () => {
	it("should reject a nullable column that is not a column", () => {
		expect(
			() =>
				new SchemaCatalog({
					tables: { t: { columns: ["id"], nullable: ["missing"] } },
					textColumns: [],
					compositeTextColumns: [],
					columnCorrections: {},
					relations: [],
				}),
		).toThrow(ChatRouterError)
	})

	it("should reject chained corrections", () => {
		expect(
			() =>
				new SchemaCatalog({
					tables: { t: { columns: ["a", "b", "c"] } },
					textColumns: [],
					compositeTextColumns: [],
					columnCorrections: { a: "b", b: "c" },
					relations: [],
				}),
		).toThrow(/itself listed as a wrong name/)
	})
})

describe("parseSchemaCatalog", () => {
	it("should report the failing path", () => {
		expect(() => parseSchemaCatalog({ tables: { t: { columns: [] } } })).toThrow(/tables\.t\.columns/)
	})

	it("should default the optional sections", () => {
		const catalog = parseSchemaCatalog({ tables: { t: { columns: ["id", "note"] } } })
		expect(catalog.isNullable("t", "note")).toBe(false)
		expect(catalog.columnCorrections()).toEqual([])
		expect(catalog.relationForChild("t")).toBeUndefined()
	})
})
