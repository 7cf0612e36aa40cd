/**
 * Schema Catalog
 *
 * Static description of what generated SQL may reference: tables and their
 * columns, nullable columns, text columns compared case-insensitively, the
 * composite "<PREFIX> <NAME>" column, known wrong→right column names and the
 * one-to-many relations used by the fan-out de-duplication pass.
 *
 * Built once at startup and never mutated. All identifier lookups are
 * case-insensitive.
 */

import * as fs from "fs"
import * as yaml from "js-yaml"
import { z } from "zod"
import { ChatRouterError } from "./errors.js"

// ============================================================================
// Types
// ============================================================================

export interface TableDefinition {
	columns: readonly string[]
	nullable?: readonly string[]
}

export interface OneToManyRelation {
	parent: string
	parentKey: string
	child: string
	childKey: string
}

export interface SchemaCatalogDefinition {
	tables: Readonly<Record<string, TableDefinition>>
	textColumns: readonly string[]
	compositeTextColumns: readonly string[]
	columnCorrections: Readonly<Record<string, string>>
	relations: readonly OneToManyRelation[]
}

// ============================================================================
// Catalog
// ============================================================================

export class SchemaCatalog {
	private readonly columns: ReadonlyMap<string, ReadonlySet<string>>
	private readonly nullable: ReadonlyMap<string, ReadonlySet<string>>
	private readonly text: ReadonlySet<string>
	private readonly composite: ReadonlySet<string>
	private readonly corrections: ReadonlyMap<string, string>
	private readonly relationList: readonly OneToManyRelation[]

	constructor(definition: SchemaCatalogDefinition) {
		const columns = new Map<string, Set<string>>()
		const nullable = new Map<string, Set<string>>()

		for (const [table, def] of Object.entries(definition.tables)) {
			const key = table.toLowerCase()
			const cols = new Set(def.columns.map((c) => c.toLowerCase()))
			const nulls = new Set((def.nullable ?? []).map((c) => c.toLowerCase()))
			for (const col of nulls) {
				if (!cols.has(col)) {
					throw new ChatRouterError(
						"configuration",
						`Nullable column "${col}" is not a column of table "${table}"`,
					)
				}
			}
			columns.set(key, cols)
			nullable.set(key, nulls)
		}

		// A target that is also a wrong name would make the correction pass
		// rewrite its own output.
		const corrections = new Map<string, string>()
		const wrongNames = new Set(Object.keys(definition.columnCorrections).map((w) => w.toLowerCase()))
		for (const [wrong, right] of Object.entries(definition.columnCorrections)) {
			if (wrongNames.has(right.toLowerCase())) {
				throw new ChatRouterError(
					"configuration",
					`Column correction target "${right}" is itself listed as a wrong name`,
				)
			}
			corrections.set(wrong.toLowerCase(), right)
		}

		for (const rel of definition.relations) {
			if (!columns.get(rel.parent.toLowerCase())?.has(rel.parentKey.toLowerCase())) {
				throw new ChatRouterError("configuration", `Unknown relation parent ${rel.parent}.${rel.parentKey}`)
			}
			if (!columns.get(rel.child.toLowerCase())?.has(rel.childKey.toLowerCase())) {
				throw new ChatRouterError("configuration", `Unknown relation child ${rel.child}.${rel.childKey}`)
			}
		}

		this.columns = columns
		this.nullable = nullable
		this.text = new Set(definition.textColumns.map((c) => c.toLowerCase()))
		this.composite = new Set(definition.compositeTextColumns.map((c) => c.toLowerCase()))
		this.corrections = corrections
		this.relationList = Object.freeze(definition.relations.map((r) => Object.freeze({ ...r })))
		Object.freeze(this)
	}

	isKnownTable(table: string): boolean {
		return this.columns.has(table.toLowerCase())
	}

	isKnownColumn(table: string, column: string): boolean {
		return this.columns.get(table.toLowerCase())?.has(column.toLowerCase()) ?? false
	}

	isNullable(table: string, column: string): boolean {
		return this.nullable.get(table.toLowerCase())?.has(column.toLowerCase()) ?? false
	}

	isTextColumn(column: string): boolean {
		return this.text.has(column.toLowerCase())
	}

	isCompositeTextColumn(column: string): boolean {
		return this.composite.has(column.toLowerCase())
	}

	correctedColumnName(wrong: string): string | undefined {
		return this.corrections.get(wrong.toLowerCase())
	}

	/** [wrong, correct] pairs */
	columnCorrections(): Array<[string, string]> {
		return [...this.corrections.entries()]
	}

	textColumns(): string[] {
		return [...this.text]
	}

	compositeTextColumns(): string[] {
		return [...this.composite]
	}

	relationForChild(table: string): OneToManyRelation | undefined {
		const key = table.toLowerCase()
		return this.relationList.find((r) => r.child.toLowerCase() === key)
	}
}

// ============================================================================
// Loading
// ============================================================================

const catalogFileSchema = z.object({
	tables: z.record(
		z.object({
			columns: z.array(z.string().min(1)).min(1),
			nullable: z.array(z.string().min(1)).default([]),
		}),
	),
	text_columns: z.array(z.string().min(1)).default([]),
	composite_text_columns: z.array(z.string().min(1)).default([]),
	column_corrections: z.record(z.string().min(1)).default({}),
	relations: z
		.array(
			z.object({
				parent: z.string().min(1),
				parent_key: z.string().min(1),
				child: z.string().min(1),
				child_key: z.string().min(1),
			}),
		)
		.default([]),
})

export function parseSchemaCatalog(raw: unknown): SchemaCatalog {
	const parsed = catalogFileSchema.safeParse(raw)
	if (!parsed.success) {
		throw new ChatRouterError(
			"configuration",
			`Invalid schema catalog: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
		)
	}
	const data = parsed.data
	return new SchemaCatalog({
		tables: data.tables,
		textColumns: data.text_columns,
		compositeTextColumns: data.composite_text_columns,
		columnCorrections: data.column_corrections,
		relations: data.relations.map((r) => ({
			parent: r.parent,
			parentKey: r.parent_key,
			child: r.child,
			childKey: r.child_key,
		})),
	})
}

export function loadSchemaCatalog(filePath: string): SchemaCatalog {
	if (!fs.existsSync(filePath)) {
		throw new ChatRouterError("configuration", `Schema catalog not found: ${filePath}`, false, { filePath })
	}
	const raw: unknown = yaml.load(fs.readFileSync(filePath, "utf-8"))
	return parseSchemaCatalog(raw)
}
