import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { DeclarationCache } from "../../src/filesystem/declaration-cache.js";
import { DECLARATION_FILENAMES, findDeclarationFile, readDeclarations } from "../../src/filesystem/declarations.js";
import { ModelRegistry } from "../../src/registry/model-registry.js";

const PERSON_YAML = "models:\n  Person:\n    fields:\n      name: { type: string }\n";
const PERSON_JSON = JSON.stringify({ models: { Person: { fields: { id: { type: "integer" } } } } });

describe("declaration files", () => {
	let tempDir: string;

	beforeEach(async () => {
		tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "declarations-test-"));
	});

	afterEach(async () => {
		await fs.promises.rm(tempDir, { recursive: true, force: true });
	});

	it("lists supported file names in precedence order", () => {
		expect(DECLARATION_FILENAMES).toEqual(["_models.json", "_models.yml", "_models.yaml"]);
	});

	it("finds nothing in an empty directory", () => {
		expect(findDeclarationFile(tempDir)).toBeNull();
		expect(readDeclarations(tempDir)).toBeNull();
	});

	it("finds YAML declaration files", () => {
		fs.writeFileSync(path.join(tempDir, "_models.yaml"), PERSON_YAML);

		expect(findDeclarationFile(tempDir)).toBe(path.join(tempDir, "_models.yaml"));
	});

	it("prefers JSON declaration files", () => {
		fs.writeFileSync(path.join(tempDir, "_models.yml"), PERSON_YAML);
		fs.writeFileSync(path.join(tempDir, "_models.json"), PERSON_JSON);

		const result = readDeclarations(tempDir);

		expect(result?.sourcePath).toBe(path.join(tempDir, "_models.json"));
		expect(result?.models.get("Person")?.schema.fieldNames()).toEqual(["id"]);
	});

	it("registers into a given registry", () => {
		fs.writeFileSync(path.join(tempDir, "_models.yml"), PERSON_YAML);
		const registry = new ModelRegistry();

		readDeclarations(tempDir, registry);

		expect(registry.names()).toEqual(["Person"]);
	});
});

describe("DeclarationCache", () => {
	let tempDir: string;
	let cache: DeclarationCache;

	beforeEach(async () => {
		tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "declaration-cache-test-"));
		cache = new DeclarationCache();
	});

	afterEach(async () => {
		await fs.promises.rm(tempDir, { recursive: true, force: true });
	});

	it("remembers directories without declarations", () => {
		expect(cache.get(tempDir)).toBeNull();
		expect(cache.has(tempDir)).toBe(true);
		expect(cache.getError(tempDir)).toBeNull();

		fs.writeFileSync(path.join(tempDir, "_models.yml"), PERSON_YAML);
		expect(cache.get(tempDir)).toBeNull();

		cache.invalidate(tempDir);
		expect(cache.get(tempDir)?.registry.names()).toEqual(["Person"]);
	});

	it("loads declarations once", () => {
		fs.writeFileSync(path.join(tempDir, "_models.yml"), PERSON_YAML);

		const first = cache.get(tempDir);
		fs.writeFileSync(path.join(tempDir, "_models.yml"), "models:\n  Other: {}\n");
		const second = cache.get(tempDir);

		expect(first).not.toBeNull();
		expect(second).toBe(first);
		expect(cache.has(tempDir)).toBe(true);
	});

	it("shares one registry across directories", () => {
		const other = path.join(tempDir, "other");
		fs.mkdirSync(other);
		fs.writeFileSync(path.join(tempDir, "_models.yml"), PERSON_YAML);
		fs.writeFileSync(
			path.join(other, "_models.yml"),
			"models:\n  Employee:\n    extends: [Person]\n    fields:\n      title: { type: string }\n",
		);

		cache.get(tempDir);
		const result = cache.get(other);

		expect(result?.registry).toBe(cache.registry);
		expect(result?.models.get("Employee")?.schema.fieldNames()).toEqual(["name", "title"]);
		expect(cache.registry.names()).toEqual(["Person", "Employee"]);
	});

	it("uses a given registry", () => {
		const registry = new ModelRegistry();
		fs.writeFileSync(path.join(tempDir, "_models.yml"), PERSON_YAML);

		expect(new DeclarationCache(registry).get(tempDir)?.registry).toBe(registry);
		expect(registry.names()).toEqual(["Person"]);
	});

	it("records a model declared by two directories as an error", () => {
		const other = path.join(tempDir, "other");
		fs.mkdirSync(other);
		fs.writeFileSync(path.join(tempDir, "_models.yml"), PERSON_YAML);
		fs.writeFileSync(path.join(other, "_models.json"), PERSON_JSON);

		cache.get(tempDir);

		expect(cache.get(other)).toBeNull();
		expect(cache.getError(other)).toBe('Model "Person" is already registered.');
		expect(cache.has(other)).toBe(false);
		expect(cache.registry.get("Person")?.schema.fieldNames()).toEqual(["name"]);
	});

	it("records load errors", () => {
		fs.writeFileSync(path.join(tempDir, "_models.yml"), "models:\n  Person:\n    fields:\n      name: { type: text }\n");

		expect(cache.get(tempDir)).toBeNull();
		expect(cache.getError(tempDir)).toBe(
			'Invalid type "text". Allowed types: any, string, number, integer, list, dict, model. (at models.Person.fields.name.type)',
		);
		expect(cache.has(tempDir)).toBe(false);
	});

	it("reloads after invalidation", () => {
		fs.writeFileSync(path.join(tempDir, "_models.yml"), PERSON_YAML);
		const first = cache.get(tempDir);

		fs.writeFileSync(path.join(tempDir, "_models.yml"), "models:\n  Other: {}\n");
		cache.invalidate(tempDir);
		const second = cache.get(tempDir);

		expect(second).not.toBe(first);
		expect(second?.registry.names()).toEqual(["Other"]);
		expect(cache.registry.has("Person")).toBe(false);
	});

	it("invalidates every directory", () => {
		fs.writeFileSync(path.join(tempDir, "_models.yml"), PERSON_YAML);
		cache.get(tempDir);
		cache.invalidateAll();

		expect(cache.has(tempDir)).toBe(false);
		expect(cache.registry.names()).toEqual([]);
	});
});
