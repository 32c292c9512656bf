export const DEPARTMENT_NAMES = ["HR", "Engineering", "Sales", "Finance", "Support"] as const;

export type DepartmentName = (typeof DEPARTMENT_NAMES)[number];

export interface DepartmentProfile {
  name: DepartmentName;
  /** How the department introduces itself in prompts. */
  title: string;
  responsibilities: readonly string[];
  styleGuide: string;
  /** Extra labels the classifier may use for this department. */
  aliases: readonly string[];
  /** Metadata value fragments are tagged with and filtered on. */
  retrievalKey: string;
  /** Folder under data/ holding the department's source documents. */
  dataFolder: string;
}
