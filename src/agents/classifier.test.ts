import { FakeListChatModel } from "@langchain/core/utils/testing";
import { describe, expect, it, vi } from "vitest";
import { DepartmentCatalog } from "../departments/catalog.js";
import { ClassificationUnavailable } from "../errors.js";
import { LlmDepartmentClassifier, parseClassifierOutput } from "./classifier.js";

const catalog = DepartmentCatalog.fromOrder();

describe("parseClassifierOutput", () => {
  it("reads a strict departments object", () => {
    expect(parseClassifierOutput('{"departments": ["Sales"]}', catalog)).toEqual({
      kind: "parsed",
      departments: ["Sales"],
      rejected: []
    });
  });

  it("extracts the payload from prose and code fences", () => {
    const raw = 'Sure, here is the routing:\n```json\n{"departments": ["Finance", "Sales"]}\n```\nLet me know!';
    expect(parseClassifierOutput(raw, catalog)).toEqual({
      kind: "parsed",
      departments: ["Finance", "Sales"],
      rejected: []
    });
  });

  it("accepts a bare list and resolves aliases", () => {
    expect(parseClassifierOutput('["customer support", "HR Department"]', catalog)).toEqual({
      kind: "parsed",
      departments: ["Support", "HR"],
      rejected: []
    });
  });

  it("drops unknown and non-string labels", () => {
    expect(parseClassifierOutput('{"departments": ["Sales", "Legal", 42]}', catalog)).toEqual({
      kind: "parsed",
      departments: ["Sales"],
      rejected: ["Legal", "42"]
    });
  });

  it("removes duplicate labels", () => {
    expect(parseClassifierOutput('["Sales", "sales", "SALES"]', catalog)).toEqual({
      kind: "parsed",
      departments: ["Sales"],
      rejected: []
    });
  });

  it("skips JSON that is not a department payload", () => {
    expect(parseClassifierOutput('{"note": "see below"} then {"departments": ["HR"]}', catalog)).toEqual({
      kind: "parsed",
      departments: ["HR"],
      rejected: []
    });
  });

  it("skips lists that are not department labels", () => {
    expect(parseClassifierOutput('Confidence [0.9]: {"departments": ["Sales"]}', catalog)).toEqual({
      kind: "parsed",
      departments: ["Sales"],
      rejected: []
    });
  });

  it("treats an empty list as a parsed, empty classification", () => {
    expect(parseClassifierOutput('{"departments": []}', catalog)).toEqual({
      kind: "parsed",
      departments: [],
      rejected: []
    });
  });

  it("reports output without a JSON payload as malformed", () => {
    expect(parseClassifierOutput("departments: [HR, Sales]", catalog)).toEqual({
      kind: "malformed",
      raw: "departments: [HR, Sales]"
    });
    expect(parseClassifierOutput('{"departments": ["HR"', catalog)).toEqual({
      kind: "malformed",
      raw: '{"departments": ["HR"'
    });
  });

  it("only accepts departments of the given catalog", () => {
    const reduced = DepartmentCatalog.fromOrder(["Sales", "Finance"]);
    expect(parseClassifierOutput('["HR", "Finance"]', reduced)).toEqual({
      kind: "parsed",
      departments: ["Finance"],
      rejected: ["HR"]
    });
  });
});

describe("LlmDepartmentClassifier", () => {
  it("classifies from a single model call", async () => {
    const llm = new FakeListChatModel({ responses: ['{"departments": ["Engineering"]}'] });
    const invoke = vi.spyOn(llm, "invoke");
    const classifier = new LlmDepartmentClassifier(llm, catalog);

    await expect(classifier.classify("The deploy pipeline is failing")).resolves.toEqual({
      kind: "parsed",
      departments: ["Engineering"],
      rejected: []
    });
    expect(invoke).toHaveBeenCalledTimes(1);
  });

  it("returns malformed output instead of failing", async () => {
    const llm = new FakeListChatModel({ responses: ["I am not sure which team handles this."] });
    const classifier = new LlmDepartmentClassifier(llm, catalog);

    await expect(classifier.classify("Hello?")).resolves.toEqual({
      kind: "malformed",
      raw: "I am not sure which team handles this."
    });
  });

  it("surfaces a failed model call as ClassificationUnavailable", async () => {
    const llm = new FakeListChatModel({ responses: [] });
    vi.spyOn(llm, "invoke").mockRejectedValue(Object.assign(new Error("rate limited"), { status: 429 }));
    const classifier = new LlmDepartmentClassifier(llm, catalog);

    const error = await classifier.classify("What are the payment terms?").catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ClassificationUnavailable);
    expect(error).toMatchObject({
      transient: true,
      message: "Department classification unavailable: rate limited"
    });
  });

  it("lets cancellation through untouched", async () => {
    const llm = new FakeListChatModel({ responses: [] });
    vi.spyOn(llm, "invoke").mockRejectedValue(new Error("Aborted"));
    const classifier = new LlmDepartmentClassifier(llm, catalog);

    const error = await classifier.classify("What are the payment terms?").catch((caught: unknown) => caught);
    expect(error).not.toBeInstanceOf(ClassificationUnavailable);
    expect(error).toMatchObject({ message: "Aborted" });
  });
});
