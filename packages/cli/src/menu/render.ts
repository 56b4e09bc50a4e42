import {
  type Project,
  describeProject,
  getBuildOutputPath,
} from "../projects/index.js";

export const EMPTY_LISTING = "No Rust projects found.";
export const SELECTION_PROMPT =
  "Enter the number of the project to view details, or 'q' to quit:";

export function formatProjectLine(project: Project, index: number): string {
  return `${index}. ${project.name} - ${describeProject(project)}`;
}

/**
 * The numbered listing followed by the selection instructions.
 */
export function formatListing(projects: readonly Project[]): string[] {
  if (projects.length === 0) {
    return [EMPTY_LISTING];
  }
  return [
    ...projects.map((project, i) => formatProjectLine(project, i + 1)),
    "",
    SELECTION_PROMPT,
  ];
}

export function formatProjectDetails(project: Project): string[] {
  return [
    `Project Name: ${project.name}`,
    `Description: ${describeProject(project)}`,
    `Path: ${project.path}`,
    `You can run this project from: ${getBuildOutputPath(project)}`,
  ];
}
