import fs from "node:fs";
import path from "node:path";

export const DEFINITION_FILE_SUFFIX = ".def.xml";

const isDefinitionFile = (file: string): boolean => file.endsWith(DEFINITION_FILE_SUFFIX);

const toPosixPath = (filePath: string): string => filePath.split(path.sep).join("/");

export const makeCliError = (code: string, message: string): Error & { code: string } => {
  return Object.assign(new Error(message), { code });
};

export const resolveDefsDir = (defsDir: string): string => {
  const resolved = path.resolve(defsDir);
  if (!fs.existsSync(resolved)) {
    throw makeCliError("CLI_DEFS_DIR_NOT_FOUND", `Definitions directory does not exist: ${resolved}`);
  }
  if (!fs.statSync(resolved).isDirectory()) {
    throw makeCliError("CLI_DEFS_DIR_NOT_FOUND", `Definitions path is not a directory: ${resolved}`);
  }
  return resolved;
};

/** Reads every `.def.xml` file below `defsDir`, keyed by its posix path relative to the directory. */
export const readDefinitionsXmlFromDir = (defsDir: string): Record<string, string> => {
  const root = resolveDefsDir(defsDir);
  const collectFiles = (relativeDir = ""): string[] => {
    const fullDir = relativeDir ? path.join(root, relativeDir) : root;
    const entries = fs.readdirSync(fullDir, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));
    const collected: string[] = [];
    for (const entry of entries) {
      const relativePath = relativeDir ? path.join(relativeDir, entry.name) : entry.name;
      if (entry.isDirectory()) {
        collected.push(...collectFiles(relativePath));
        continue;
      }
      if (entry.isFile() && isDefinitionFile(entry.name)) {
        collected.push(toPosixPath(relativePath));
      }
    }
    return collected;
  };

  const xmlByPath: Record<string, string> = {};
  for (const file of collectFiles().sort()) {
    xmlByPath[file] = fs.readFileSync(path.join(root, ...file.split("/")), "utf8");
  }
  return xmlByPath;
};
