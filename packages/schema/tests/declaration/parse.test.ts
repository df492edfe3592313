import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { NullNotAllowedError, TypeMismatchError } from "@schemata/core";
import {
	buildField,
	detectFormat,
	parseDeclarationContent,
	parseDeclarationFile,
	type DeclarationLoadResult,
} from "../../src/declaration/parse.js";
import { DeclarationError } from "../../src/errors.js";
import { defineModel, type ModelClass } from "../../src/model/model.js";
import { ModelRegistry } from "../../src/registry/model-registry.js";

const PEOPLE = [
	"$schema: urn:schemata:declaration:v1",
	"models:",
	"  Employee:",
	"    extends: [Person]",
	"    allow-unknown-data: false",
	"    attributes: { table: employees }",
	"    fields:",
	"      manager: { type: model, model: Employee, nullable: true }",
	"      skills: { type: list, of: { type: string, name: skill } }",
	"  Person:",
	"    fields:",
	"      name: { type: string }",
	"      age: { type: integer, nullable: true, min: 0 }",
].join("\n");

function modelOf(result: DeclarationLoadResult, name: string): ModelClass {
	const model = result.models.get(name);
	if (!model) {
		throw new Error(`Model "${name}" was not declared`);
	}
	return model;
}

describe("detectFormat", () => {
	it("detects JSON by extension and defaults to YAML", () => {
		expect(detectFormat("/a/_models.json")).toBe("json");
		expect(detectFormat("/a/_models.yml")).toBe("yaml");
		expect(detectFormat("/a/_models.yaml")).toBe("yaml");
	});
});

describe("buildField", () => {
	it("builds numeric fields with their options", () => {
		const field = buildField({ type: "integer", min: 0, max: 10, acceptBooleans: false }, new ModelRegistry());

		expect(field.kind).toBe("integer");
		expect(field.describeExpected()).toBe("integer | bigint");
		expect(() => field.validate(11)).toThrow('Field "<unbound>" value 11 is outside [0, 10].');
	});

	it("builds nested container fields", () => {
		const field = buildField(
			{ type: "dict", ofKey: { type: "string" }, ofValue: { type: "list", of: { type: "number", name: "n" } } },
			new ModelRegistry(),
		);

		expect(() => field.validate({ a: [1, 2.5] })).not.toThrow();
		expect(() => field.validate({ a: ["x"] })).toThrow('Field "n" expects number | bigint | boolean, got string.');
	});

	it("resolves model references when validating", () => {
		const registry = new ModelRegistry();
		const field = buildField({ type: "model", model: "Later" }, registry);
		const Later = defineModel({ name: "Later" });
		registry.register(Later);

		expect(() => field.validate(new Later())).not.toThrow();
	});

	it("requires a model name for model fields", () => {
		expect(() => buildField({ type: "model" }, new ModelRegistry())).toThrow(DeclarationError);
	});
});

describe("parseDeclarationContent", () => {
	it("defines models ancestors first", () => {
		const result = parseDeclarationContent(PEOPLE);

		expect([...result.models.keys()]).toEqual(["Person", "Employee"]);
		expect(result.registry.names()).toEqual(["Person", "Employee"]);
	});

	it("resolves inherited fields, policies and attributes", () => {
		const Employee = modelOf(parseDeclarationContent(PEOPLE), "Employee");

		expect(Employee.schema.fieldNames()).toEqual(["name", "age", "manager", "skills"]);
		expect(Employee.schema.allowUnknownData).toBe(false);
		expect(Employee.attributes).toEqual({ table: "employees" });
	});

	it("produces working models", () => {
		const result = parseDeclarationContent(PEOPLE);
		const Person = modelOf(result, "Person");
		const Employee = modelOf(result, "Employee");
		const boss = new Employee({ name: "Grace", skills: [] });
		const employee = Employee.fromMapping({ name: "Ada", age: 36, manager: boss, skills: ["ts"] });

		expect(() => employee.validate()).not.toThrow();
		expect(Person.isInstance(employee)).toBe(true);
		expect(() => Employee.fromMapping({ name: "Ada", skills: ["ts", 1] }).validate()).toThrow(
			'Field "skill" expects string, got integer.',
		);
		expect(() => new Employee({ name: "Ada" }).validate()).toThrow(NullNotAllowedError);
	});

	it("checks self references against the model", () => {
		const result = parseDeclarationContent(PEOPLE);
		const Person = modelOf(result, "Person");
		const Employee = modelOf(result, "Employee");
		const employee = Employee.fromMapping({ name: "Ada", manager: new Person({ name: "Grace" }), skills: [] });

		expect(() => employee.validate()).toThrow(TypeMismatchError);
		expect(() => employee.validate()).toThrow('Field "manager" expects Employee, got Person.');
	});

	it("supports mutually referential models", () => {
		const result = parseDeclarationContent(
			[
				"models:",
				"  Author:",
				"    fields:",
				"      books: { type: list, of: { type: model, model: Book } }",
				"  Book:",
				"    fields:",
				"      author: { type: model, model: Author, nullable: true }",
			].join("\n"),
		);
		const Author = modelOf(result, "Author");
		const Book = modelOf(result, "Book");
		const author = new Author({ books: [new Book()] });

		expect(() => author.validate()).not.toThrow();
	});

	it("parses JSON", () => {
		const content = JSON.stringify({
			models: { Point: { fields: { x: { type: "number" }, y: { type: "number", "accept-booleans": false } } } },
		});
		const Point = modelOf(parseDeclarationContent(content, { format: "json" }), "Point");

		expect(() => Point.fromMapping({ x: 1, y: 2 }).validate()).not.toThrow();
		expect(() => Point.fromMapping({ x: 1, y: true }).validate()).toThrow(
			'Field "y" expects number | bigint, got boolean.',
		);
	});

	it("registers into a given registry and resolves its models", () => {
		const registry = new ModelRegistry();
		parseDeclarationContent("models:\n  Base:\n    fields:\n      id: { type: integer }\n", { registry });
		const result = parseDeclarationContent("models:\n  Child:\n    extends: [Base]\n", { registry });

		expect(result.registry).toBe(registry);
		expect(modelOf(result, "Child").schema.fieldNames()).toEqual(["id"]);
		expect(registry.names()).toEqual(["Base", "Child"]);
	});

	it("rejects models that are already registered", () => {
		const registry = new ModelRegistry();
		parseDeclarationContent("models:\n  Base: {}\n", { registry });

		expect(() => parseDeclarationContent("models:\n  Base: {}\n", { registry })).toThrow(
			'Model "Base" is already registered.',
		);
	});

	it("registers nothing when a document fails to load", () => {
		const registry = new ModelRegistry();

		expect(() => parseDeclarationContent('models:\n  Person: {}\n  " ": {}\n', { registry })).toThrow(
			"Model name must be a non-empty string. (at models. )",
		);
		expect(registry.names()).toEqual([]);

		const result = parseDeclarationContent("models:\n  Person: {}\n", { registry });
		expect(result.registry.names()).toEqual(["Person"]);
	});

	it("loads models named like object prototype members", () => {
		const content = '{"models":{"__proto__":{"fields":{"x":{"type":"integer"}}}}}';
		const result = parseDeclarationContent(content, { format: "json" });

		expect(modelOf(result, "__proto__").schema.fieldNames()).toEqual(["x"]);
		expect(result.registry.names()).toEqual(["__proto__"]);
	});

	it("orders and resolves ancestors named like object prototype members", () => {
		const result = parseDeclarationContent(
			"models:\n  toString:\n    extends: [constructor]\n  constructor:\n    fields:\n      id: { type: integer }\n",
		);

		expect([...result.models.keys()]).toEqual(["constructor", "toString"]);
		expect(modelOf(result, "toString").schema.fieldNames()).toEqual(["id"]);
		expect(() => parseDeclarationContent("models:\n  constructor:\n    extends: [toString]\n")).toThrow(
			'Model "constructor" extends unknown model "toString". (at models.constructor.extends[0])',
		);
	});

	it("rejects inheritance cycles", () => {
		expect(() => parseDeclarationContent("models:\n  A: { extends: [B] }\n  B: { extends: [A] }\n")).toThrow(
			'Model "A" inherits from itself. (at models.A.extends)',
		);
	});

	it("rejects invalid field types with their location", () => {
		expect(() => parseDeclarationContent("models:\n  Person:\n    fields:\n      name: { type: text }\n")).toThrow(
			'Invalid type "text". Allowed types: any, string, number, integer, list, dict, model. (at models.Person.fields.name.type)',
		);
	});

	it("tolerates warnings", () => {
		const result = parseDeclarationContent(
			"models:\n  Person:\n    fields:\n      name: { type: string, description: Full name }\n",
		);

		expect(modelOf(result, "Person").schema.fieldNames()).toEqual(["name"]);
	});

	it("rejects empty documents", () => {
		expect(() => parseDeclarationContent("")).toThrow("Declaration document is empty or invalid");
	});

	it("wraps syntax errors", () => {
		try {
			parseDeclarationContent("models: [", { sourcePath: "/tmp/_models.yml" });
			expect.unreachable("Expected a syntax error to throw");
		} catch (error) {
			if (!(error instanceof DeclarationError)) {
				throw error;
			}
			expect(error.message).toMatch(/^Failed to parse declarations: /);
			expect(error.declarationPath).toBe("/tmp/_models.yml");
			expect(error.cause).toBeInstanceOf(Error);
		}
	});
});

describe("parseDeclarationFile", () => {
	let tempDir: string;

	beforeEach(async () => {
		tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "declaration-test-"));
	});

	afterEach(async () => {
		await fs.promises.rm(tempDir, { recursive: true, force: true });
	});

	it("reads YAML files", () => {
		const file = path.join(tempDir, "_models.yml");
		fs.writeFileSync(file, PEOPLE);

		const result = parseDeclarationFile(file);

		expect(result.sourcePath).toBe(file);
		expect([...result.models.keys()]).toEqual(["Person", "Employee"]);
	});

	it("reads JSON files", () => {
		const file = path.join(tempDir, "_models.json");
		fs.writeFileSync(file, JSON.stringify({ models: { Tag: { fields: { label: { type: "string" } } } } }));

		expect(modelOf(parseDeclarationFile(file), "Tag").schema.fieldNames()).toEqual(["label"]);
	});

	it("reports unreadable files", () => {
		const file = path.join(tempDir, "missing.yml");

		try {
			parseDeclarationFile(file);
			expect.unreachable("Expected a missing file to throw");
		} catch (error) {
			if (!(error instanceof DeclarationError)) {
				throw error;
			}
			expect(error.message).toMatch(/^Failed to read declaration file: /);
			expect(error.declarationPath).toBe(file);
		}
	});
});
