import { AutoScriptError } from "../core/errors.js";
import { BODY_PLACEHOLDER, LOG_SEVERITY_NAMES, LogLevel, SOURCE_CODE_SCRIPT } from "../core/types.js";
import type { CompileHeader, ScriptDefinition, ScriptNode, ScriptResolver } from "../core/types.js";
import { localizeText } from "./localize.js";
import { buildPredefined } from "./predefined.js";
import { StringPool, constantRef, toLiteral } from "./string-pool.js";
import type { StringHash } from "./string-pool.js";
import { coerceParams, renderLiteral } from "./values.js";
import type { CoercedParam, CoercionContext, ParamLiteral } from "./values.js";

const EOL = "\n";
const CALL_INDENT = "   ";
const TRAILING_NEWLINES = /[\r\n]+$/;

export interface CompileOptions {
  resolve: ScriptResolver;
  header: CompileHeader;
  hash?: StringHash;
}

type BoolLiteral = Extract<ParamLiteral, { kind: "bool" }>;
type SourceLiteral = Extract<ParamLiteral, { kind: "source" }>;

export const toIdName = (name: string): string => {
  const id = name.replace(/[^A-Za-z0-9_]/g, "_");
  return /^[0-9]/.test(id) ? `_${id}` : id;
};

const callStatement = (id: string, args: string[]): string => `${CALL_INDENT}${id}(${args.join(",")})${EOL}`;

const traceStatement = (definition: ScriptDefinition, paramNames: string[]): string =>
  `initcmd(${toLiteral(definition.name)}${paramNames.map((name) => `,${name}`).join("")})`;

const replaceBody = (code: string, body: string): string => code.split(BODY_PLACEHOLDER).join(body);

const functionBlock = (
  id: string,
  params: CoercedParam[],
  definition: ScriptDefinition,
  code: string
): string => {
  const bracketed = definition.logLevel !== LogLevel.Inherit;
  const lines = [
    `func ${id}(${params.map((param) => `${param.type} ${param.name}`).join(",")}) {`,
    traceStatement(definition, params.map((param) => param.name)),
  ];
  if (bracketed) {
    lines.push(`int prevLog = SetLogLevel(${definition.logLevel})`);
  }
  if (code.length > 0) {
    lines.push(code);
  }
  if (bracketed) {
    lines.push("SetLogLevel(prevLog)");
  }
  lines.push("}");
  return lines.join(EOL) + EOL;
};

/**
 * Turns a tree of script nodes into program text. One instance serves a single
 * compilation: it owns the string pool, the set of emitted functions and the
 * accumulated declaration block.
 */
export class ScriptCompiler {
  private readonly pool: StringPool;
  private readonly coercion: CoercionContext;
  /** Function identifier per emitted definition name. */
  private readonly emitted = new Map<string, string>();
  /** Owner of every identifier handed out: a definition name or a raw-source instance key. */
  private readonly owners = new Map<string, string>();
  private declarations = "";
  private sourceCounter = 0;

  constructor(private readonly options: CompileOptions) {
    this.pool = new StringPool({ hash: options.hash });
    const { header } = options;
    this.coercion = {
      pool: this.pool,
      localize: (text, definition) =>
        header.localize ? header.localize(text, definition, header.lang) : localizeText(text, definition, header.lang),
    };
  }

  compileChildren(nodes: ScriptNode[]): string {
    let body = "";
    for (const node of nodes) {
      body += this.compileNode(node);
    }
    return body;
  }

  compileNode(node: ScriptNode): string {
    if (node.disabled) {
      return "";
    }
    const definition = this.requireDefinition(node.name);
    const params = coerceParams(definition, node.values, this.coercion);
    if (definition.name === SOURCE_CODE_SCRIPT) {
      return this.compileSource(definition, node, params);
    }
    let id = this.emitted.get(definition.name);
    if (id === undefined) {
      id = this.allocateId(toIdName(definition.name), definition.name);
      // Marked first so a definition nested in its own subtree is emitted once.
      this.emitted.set(definition.name, id);
      this.emitFunction(id, definition, node, params);
    }
    return callStatement(
      id,
      params.map((param) => renderLiteral(param.literal))
    );
  }

  compile(root: ScriptDefinition): string {
    const params = coerceParams(root, {}, this.coercion);
    const level = root.logLevel === LogLevel.Inherit ? this.options.header.logLevel : root.logLevel;
    const predefined = buildPredefined(root, this.options.header.lang, this.pool);
    const code = replaceBody(root.code, "").trim();
    const body = this.compileChildren(root.tree);

    const lines = [
      "run {",
      ...params.map((param) => `${param.type} ${param.name} = ${renderLiteral(param.literal)}`),
      `SetLogLevel(${level})`,
      "init()",
    ];
    if (predefined) {
      lines.push(predefined);
    }
    if (code.length > 0) {
      lines.push(code);
    }
    const run = lines.join(EOL) + EOL + body + "deinit()" + EOL + "}";
    return this.renderConstants() + this.declarations + run;
  }

  /** Returns `base`, or `base_<n>` when `base` already belongs to another owner. */
  private allocateId(base: string, owner: string): string {
    let id = base;
    for (let suffix = 1; this.owners.has(id) && this.owners.get(id) !== owner; suffix += 1) {
      id = `${base}_${suffix}`;
    }
    this.owners.set(id, owner);
    return id;
  }

  private requireDefinition(name: string): ScriptDefinition {
    const definition = this.options.resolve(name);
    if (!definition) {
      throw new AutoScriptError("SCRIPT_NOT_FOUND", `Script "${name}" is not registered.`, { script: name });
    }
    return definition;
  }

  private emitFunction(id: string, definition: ScriptDefinition, node: ScriptNode, params: CoercedParam[]): void {
    const body = this.compileChildren(node.children);
    let code = replaceBody(definition.code, body).replace(TRAILING_NEWLINES, "");
    if (definition.tree.length > 0) {
      const predefined = buildPredefined(definition, this.options.header.lang, this.pool);
      const initArgs = params.map((param) => `"${param.name}", ${param.name}`).join(",");
      const scoped = [`init(${initArgs})`];
      if (predefined) {
        scoped.push(predefined);
      }
      const internal = this.compileChildren(definition.tree);
      code = [...(code.length > 0 ? [code] : []), ...scoped].join(EOL) + EOL + internal + "deinit()";
    }
    this.declarations += functionBlock(id, params, definition, code);
  }

  private compileSource(definition: ScriptDefinition, node: ScriptNode, params: CoercedParam[]): string {
    const literals = params.map((param) => param.literal);
    const global = literals.find((literal): literal is BoolLiteral => literal.kind === "bool");
    const source = literals.find((literal): literal is SourceLiteral => literal.kind === "source");
    if (!global || !source) {
      throw new AutoScriptError(
        "SOURCE_PARAMS_INVALID",
        `Script "${definition.name}" must declare a checkbox and a text parameter.`,
        { script: definition.name }
      );
    }
    const code = replaceBody(source.text, this.compileChildren(node.children));
    return global.value ? this.compileGlobalSource(code) : this.compileInlineSource(definition, code);
  }

  /** Folds the code into the declaration block; the node leaves no call site. */
  private compileGlobalSource(code: string): string {
    this.declarations += code + EOL;
    return "";
  }

  private compileInlineSource(definition: ScriptDefinition, code: string): string {
    const instance = this.sourceCounter;
    this.sourceCounter += 1;
    const id = this.allocateId(`${toIdName(definition.name)}${instance}`, `${definition.name}#${instance}`);
    this.declarations += functionBlock(id, [], definition, code.replace(TRAILING_NEWLINES, ""));
    return callStatement(id, []);
  }

  private renderConstants(): string {
    let constants = "";
    const strings = this.pool.strings();
    if (strings.length > 0) {
      constants += `const {${EOL}`;
      strings.forEach((value, index) => {
        constants += `${constantRef(index)} = ${toLiteral(value)}${EOL}`;
      });
      constants += `}${EOL}`;
    }
    return constants + `const IOTA { ${LOG_SEVERITY_NAMES.join(" ")} }${EOL}`;
  }
}

export const compileProgram = (root: ScriptDefinition, options: CompileOptions): string => {
  return new ScriptCompiler(options).compile(root);
};
