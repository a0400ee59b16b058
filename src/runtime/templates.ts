import fs from "node:fs";
import { fileURLToPath } from "node:url";

export type TemplateName = "task-runner.sh" | "sweep-row.sh";

const cache = new Map<TemplateName, string>();

/** Shell scripts shipped beside this module and uploaded to the target. */
export const loadTemplate = (name: TemplateName): string => {
  const cached = cache.get(name);
  if (cached !== undefined) {
    return cached;
  }
  const content = fs.readFileSync(
    fileURLToPath(new URL(`./templates/${name}`, import.meta.url)),
    "utf8",
  );
  cache.set(name, content);
  return content;
};
