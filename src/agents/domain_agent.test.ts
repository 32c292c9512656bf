import { FakeListChatModel } from "@langchain/core/utils/testing";
import { describe, expect, it, vi } from "vitest";
import { DepartmentCatalog } from "../departments/catalog.js";
import { GenerationFailed } from "../errors.js";
import { DomainRagAgent, isRefusalPhrase } from "./domain_agent.js";
import { RECORDS_MISSING_ANSWER, REFUSAL_PHRASE } from "./types.js";

const catalog = DepartmentCatalog.fromOrder();
const pricing = ["Starter plan: 49 USD per user per month, up to 10 users, email support."];

function agentReplying(...responses: string[]) {
  const llm = new FakeListChatModel({ responses });
  const invoke = vi.spyOn(llm, "invoke");
  return { agent: new DomainRagAgent(llm, catalog), invoke };
}

describe("DomainRagAgent", () => {
  it("answers from records without calling the model when no context was found", async () => {
    const { agent, invoke } = agentReplying("unused");

    await expect(agent.answer("How many leave days do I get?", "HR", [])).resolves.toEqual({
      kind: "answer",
      department: "HR",
      text: RECORDS_MISSING_ANSWER,
      recordsFound: false
    });
    expect(invoke).not.toHaveBeenCalled();
  });

  it("returns a substantive answer from structured output", async () => {
    const { agent, invoke } = agentReplying(
      '```json\n{"in_scope": true, "answer": "The Starter plan costs 49 USD per user per month."}\n```'
    );

    await expect(agent.answer("What pricing plans do you offer?", "Sales", pricing)).resolves.toEqual({
      kind: "answer",
      department: "Sales",
      text: "The Starter plan costs 49 USD per user per month.",
      recordsFound: true
    });
    expect(invoke).toHaveBeenCalledTimes(1);
  });

  it("refuses when the model marks the query out of scope", async () => {
    const { agent } = agentReplying(`{"in_scope": false, "answer": "${REFUSAL_PHRASE}"}`);

    await expect(agent.answer("My build is broken", "Sales", pricing)).resolves.toEqual({
      kind: "refusal",
      department: "Sales",
      text: REFUSAL_PHRASE
    });
  });

  it("refuses when the structured answer is the refusal phrase", async () => {
    const { agent } = agentReplying(`{"in_scope": true, "answer": "${REFUSAL_PHRASE}"}`);

    await expect(agent.answer("My build is broken", "Sales", pricing)).resolves.toMatchObject({ kind: "refusal" });
  });

  it("reads unstructured output as plain text", async () => {
    const { agent } = agentReplying(`"${REFUSAL_PHRASE}"`, "Payment terms are net 30 days.");

    await expect(agent.answer("Can you fix my laptop?", "Finance", ["Payment terms are net 30."])).resolves.toEqual({
      kind: "refusal",
      department: "Finance",
      text: REFUSAL_PHRASE
    });
    await expect(agent.answer("What are the payment terms?", "Finance", ["Payment terms are net 30."])).resolves.toEqual({
      kind: "answer",
      department: "Finance",
      text: "Payment terms are net 30 days.",
      recordsFound: true
    });
  });

  it("refuses when JSON output without in_scope carries the refusal phrase", async () => {
    const { agent } = agentReplying(`{"answer": "${REFUSAL_PHRASE}"}`);

    await expect(agent.answer("Fix my build", "Sales", pricing)).resolves.toEqual({
      kind: "refusal",
      department: "Sales",
      text: REFUSAL_PHRASE
    });
  });

  it("reads in_scope given as a string", async () => {
    const { agent } = agentReplying(
      '{"in_scope": "false", "answer": "Billing runs monthly."}',
      'Here you go: {"in_scope": "true", "answer": " The Starter plan costs 49 USD per user per month. "}'
    );

    await expect(agent.answer("Fix my build", "Sales", pricing)).resolves.toEqual({
      kind: "refusal",
      department: "Sales",
      text: REFUSAL_PHRASE
    });
    await expect(agent.answer("What pricing plans do you offer?", "Sales", pricing)).resolves.toEqual({
      kind: "answer",
      department: "Sales",
      text: "The Starter plan costs 49 USD per user per month.",
      recordsFound: true
    });
  });

  it("fails when JSON output carries no answer", async () => {
    const { agent } = agentReplying('{"in_scope": true}');

    await expect(agent.answer("What pricing plans do you offer?", "Sales", pricing)).rejects.toThrow(
      "Generation failed during respond (Sales): model returned an empty answer"
    );
  });

  it("wraps model failures as GenerationFailed", async () => {
    const { agent, invoke } = agentReplying();
    invoke.mockRejectedValue(new Error("invalid api key"));

    const error = await agent.answer("What are the payment terms?", "Finance", ["net 30"]).catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(GenerationFailed);
    expect(error).toMatchObject({ stage: "respond", department: "Finance", transient: false });
  });

  it("only answers for departments in its catalog", async () => {
    const agent = new DomainRagAgent(new FakeListChatModel({ responses: [] }), DepartmentCatalog.fromOrder(["HR"]));

    await expect(agent.answer("pricing", "Sales", pricing)).rejects.toThrow("Department Sales is not part of this catalog.");
  });
});

describe("isRefusalPhrase", () => {
  it("matches the canonical phrase with quoting and punctuation noise", () => {
    expect(isRefusalPhrase(REFUSAL_PHRASE)).toBe(true);
    expect(isRefusalPhrase(`  "${REFUSAL_PHRASE}"  `)).toBe(true);
    expect(isRefusalPhrase("this query does not fall under my department")).toBe(true);
  });

  it("does not match answers that merely mention it", () => {
    expect(isRefusalPhrase(`${REFUSAL_PHRASE} Please contact Finance.`)).toBe(false);
    expect(isRefusalPhrase(RECORDS_MISSING_ANSWER)).toBe(false);
  });
});
