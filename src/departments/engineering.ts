import type { DepartmentProfile } from "./types.js";

export const engineeringDepartment: DepartmentProfile = {
  name: "Engineering",
  title: "Engineering Department",
  responsibilities: [
    "Code issues and bugs",
    "System architecture",
    "Deployment and infrastructure",
    "APIs and the technical stack"
  ],
  styleGuide: "Be precise and technical. Name the component involved and give remediation steps in order.",
  aliases: ["Tech", "IT", "Technical"],
  retrievalKey: "Engineering",
  dataFolder: "engineering"
};
