import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config.llm).toEqual({
      baseUrl: "https://openrouter.ai/api/v1",
      apiKey: "",
      model: "gpt-4o-mini",
      embeddingModel: "text-embedding-3-large",
      embeddingDimensions: 1024,
      timeoutMs: 60000,
      maxRetries: 2
    });
    expect(config.pinecone).toEqual({ apiKey: "", index: "", namespace: "departments" });
    expect(config.retrievalK).toBe(4);
    expect(config.departmentOrder).toBeUndefined();
    expect(config.mergeFailurePolicy).toBe("fail");
    expect(config.port).toBe(8000);
    expect(config.langfuse).toBeUndefined();
  });

  it("reads retrieval and department settings", () => {
    const config = loadConfig({
      RETRIEVAL_K: "6",
      DEPARTMENT_ORDER: " support, sales ,HR ",
      MERGE_FAILURE_POLICY: "concatenate",
      PINECONE_CONTROLLER_HOST: "https://controller.example.test"
    });

    expect(config.retrievalK).toBe(6);
    expect(config.departmentOrder).toEqual(["Support", "Sales", "HR"]);
    expect(config.mergeFailurePolicy).toBe("concatenate");
    expect(config.pinecone.controllerHost).toBe("https://controller.example.test");
  });

  it("clamps embedding dimensions above the Pinecone free plan", () => {
    expect(loadConfig({ OPENROUTER_EMBEDDING_DIM: "3072" }).llm.embeddingDimensions).toBe(1024);
    expect(loadConfig({ OPENROUTER_EMBEDDING_DIM: "512" }).llm.embeddingDimensions).toBe(512);
  });

  it("enables Langfuse only with both keys", () => {
    expect(loadConfig({ LANGFUSE_PUBLIC_KEY: "pk-test" }).langfuse).toBeUndefined();
    expect(loadConfig({ LANGFUSE_PUBLIC_KEY: "pk-test", LANGFUSE_SECRET_KEY: "sk-test" }).langfuse).toEqual({
      publicKey: "pk-test",
      secretKey: "sk-test"
    });
  });

  it("names every invalid variable", () => {
    let caught: unknown;
    try {
      loadConfig({ RETRIEVAL_K: "0", DEPARTMENT_ORDER: "Sales,Legal", MERGE_FAILURE_POLICY: "retry" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      issues: [
        "RETRIEVAL_K: Number must be greater than 0",
        'DEPARTMENT_ORDER: unknown department "Legal"',
        "MERGE_FAILURE_POLICY: Invalid enum value. Expected 'fail' | 'concatenate', received 'retry'"
      ]
    });
  });

  it("rejects a department listed twice", () => {
    expect(() => loadConfig({ DEPARTMENT_ORDER: "HR,hr" })).toThrow('DEPARTMENT_ORDER: department "HR" listed twice');
  });
});
