import type { DepartmentProfile } from "./types.js";

export const salesDepartment: DepartmentProfile = {
  name: "Sales",
  title: "Sales Department",
  responsibilities: [
    "Pricing plans and pricing structure",
    "Product packages",
    "Business and enterprise proposals",
    "Client onboarding offers and discounts",
    "High-level billing explanation"
  ],
  styleGuide: "Maintain a professional tone and state plan names and prices exactly as the context gives them.",
  aliases: [],
  retrievalKey: "Sales",
  dataFolder: "sales"
};
