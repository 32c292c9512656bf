import type { DepartmentProfile } from "./types.js";

export const hrDepartment: DepartmentProfile = {
  name: "HR",
  title: "HR Department",
  responsibilities: [
    "Hiring and interviews",
    "Leave requests and leave policy",
    "Payroll and salary",
    "Employee benefits",
    "Internal policies"
  ],
  styleGuide:
    "Be professional and concise, cite the policy section when the context names one, and list the steps an employee has to take.",
  aliases: ["Human Resources", "People"],
  retrievalKey: "HR",
  dataFolder: "hr"
};
