import type { DepartmentProfile } from "./types.js";

export const financeDepartment: DepartmentProfile = {
  name: "Finance",
  title: "Finance Department",
  responsibilities: [
    "Invoice generation and the invoice process",
    "Payment terms",
    "Budget, revenue and cost breakdown",
    "Billing details and refund policy"
  ],
  styleGuide: "Be clear and factual. Include amounts, deadlines and approval requirements when the context has them.",
  aliases: ["Accounts", "Accounting", "Billing"],
  retrievalKey: "Finance",
  dataFolder: "finance"
};
