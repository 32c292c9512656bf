import type { DepartmentProfile } from "./types.js";

export const supportDepartment: DepartmentProfile = {
  name: "Support",
  title: "Customer Support Department",
  responsibilities: [
    "Customer complaints",
    "Account problems and account recovery",
    "Login issues",
    "Usage guidance and feature confusion",
    "Ticket process"
  ],
  styleGuide: "Be polite and helpful, and walk the customer through the fix one step at a time.",
  aliases: ["Customer Support", "Customer Service", "Helpdesk"],
  retrievalKey: "Support",
  dataFolder: "support"
};
