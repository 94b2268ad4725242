import { Activity, Project } from "./types";
import { ProjectRecord } from "./records";
import { activityFromRecord, activityToRecord } from "./frame";

export function projectToRecord(project: Project): ProjectRecord {
  return {
    key: { ...project.key },
    name: project.name,
    description: project.description,
    status: project.status,
    activities: project.activities.map(activityToRecord),
  };
}

export function projectFromRecord(record: ProjectRecord): Project {
  return {
    key: record.key,
    name: record.name,
    description: record.description,
    status: record.status,
    activities: record.activities.map(activityFromRecord),
  };
}

/**
 * Case-insensitive name search split into names starting with `needle` and
 * names merely containing it, each sorted by name.
 */
export function rankByName<T>(
  items: T[],
  needle: string,
  nameOf: (item: T) => string
): { startsWith: T[]; contains: T[] } {
  const query = needle.toLowerCase();
  const startsWith: T[] = [];
  const contains: T[] = [];
  for (const item of items) {
    const name = nameOf(item).trim().toLowerCase();
    if (name.startsWith(query)) {
      startsWith.push(item);
    } else if (name.includes(query)) {
      contains.push(item);
    }
  }
  const byName = (a: T, b: T) =>
    compareIgnoringCase(nameOf(a), nameOf(b));
  return {
    startsWith: startsWith.sort(byName),
    contains: contains.sort(byName),
  };
}

export function activitiesOf(projects: Project[]): Activity[] {
  return projects.flatMap((project) => project.activities);
}

export function compareIgnoringCase(a: string, b: string): number {
  const left = a.toLowerCase();
  const right = b.toLowerCase();
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}
