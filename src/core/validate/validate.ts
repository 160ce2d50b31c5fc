// src/core/validate/validate.ts
// Structural, scoping and version checks for Core IL documents.
// Errors are collected in document order; nothing is executed or mutated.

import { isFloatLiteral, type Document } from "../ast";
import { INT64_MAX, INT64_MIN, isBinaryOp, isLegacyHelper, isMathConst, isMathOp } from "../constants";
import {
  EXPR_SINCE,
  NEGATIVE_INDEX_SINCE,
  exprSince,
  stmtSince,
  isSealedVersion,
  isSupportedVersion,
  supportsFeature,
  versionErrorMessage,
} from "../versions";

export interface ValidationError {
  path: string;
  message: string;
}

type Node = Record<string, unknown>;

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const CALL_NAME = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;
const MODULE_PATH = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/;

export function isNode(value: unknown): value is Node {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

function isInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value);
}

function isLiteralValue(v: unknown): boolean {
  if (v === null || typeof v === "boolean" || typeof v === "string") return true;
  if (typeof v === "number") return Number.isFinite(v);
  if (typeof v === "bigint") return v >= INT64_MIN && v <= INT64_MAX;
  return isFloatLiteral(v) && Number.isFinite(v.float);
}

type Scope = {
  defined: Set<string>;
  loopDepth: number;
  inFunc: boolean;
  topLevel: boolean;
};

/**
 * Validate a parsed Core IL document.
 * Returns an empty list when the document is accepted.
 */
export function validate(doc: unknown): ValidationError[] {
  const errors: ValidationError[] = [];
  const add = (path: string, message: string): void => {
    errors.push({ path, message });
  };

  if (!isNode(doc)) {
    add("$", "document must be an object");
    return errors;
  }

  const version = doc.version;
  if (!isSupportedVersion(version)) {
    add("$.version", versionErrorMessage());
  }
  // Gate against the newest version when the declared one is unusable
  const effectiveVersion = typeof version === "string" && isSupportedVersion(version) ? version : "coreil-1.10.5";
  const sealed = isSealedVersion(effectiveVersion);

  // ── expressions ──

  const expr = (node: unknown, path: string, scope: Scope): void => {
    if (!isNode(node)) {
      add(path, "expected expression object");
      return;
    }
    const type = node.type;
    if (typeof type !== "string") {
      add(`${path}.type`, "missing type");
      return;
    }
    if (type === "Range") {
      add(path, "Range is only allowed as the iter of For");
      return;
    }
    const since = exprSince(type);
    if (since === undefined) {
      add(`${path}.type`, `unknown type '${type}'`);
      return;
    }
    if (!supportsFeature(effectiveVersion, since)) {
      add(`${path}.type`, `'${type}' requires ${since} or later`);
    }

    const sub = (key: string): void => {
      if (!(key in node)) {
        add(`${path}.${key}`, `missing ${key}`);
        return;
      }
      expr(node[key], `${path}.${key}`, scope);
    };
    const optSub = (key: string): void => {
      if (node[key] !== undefined) expr(node[key], `${path}.${key}`, scope);
    };
    const list = (key: string): void => {
      const items = node[key];
      if (!Array.isArray(items)) {
        add(`${path}.${key}`, `missing or invalid ${key}`);
        return;
      }
      items.forEach((item, i) => expr(item, `${path}.${key}[${i}]`, scope));
    };
    const name = (key: string): void => {
      if (!isNonEmptyString(node[key])) add(`${path}.${key}`, `missing or invalid ${key}`);
    };

    switch (type) {
      case "Literal": {
        if (!("value" in node)) {
          add(`${path}.value`, "missing value");
          break;
        }
        if (!isLiteralValue(node.value)) add(`${path}.value`, "invalid literal value");
        break;
      }
      case "Var": {
        const n = node.name;
        if (!isNonEmptyString(n)) {
          add(`${path}.name`, "missing or invalid name");
        } else if (!scope.defined.has(n)) {
          add(`${path}.name`, `variable '${n}' used before definition`);
        }
        break;
      }
      case "Binary":
        if (!isBinaryOp(node.op)) add(`${path}.op`, "missing or invalid op");
        sub("left");
        sub("right");
        break;
      case "Not":
        sub("arg");
        break;
      case "Call":
        callNode(node, path, scope);
        break;
      case "Ternary":
        sub("test");
        sub("consequent");
        sub("alternate");
        break;
      case "StringFormat":
      case "Array":
      case "Tuple":
      case "Set":
        list(type === "StringFormat" ? "parts" : "items");
        break;
      case "Index":
      case "CharAt":
        sub("base");
        sub("index");
        literalIndex(node.index, `${path}.index`);
        break;
      case "Slice":
      case "Substring":
        sub("base");
        sub("start");
        sub("end");
        break;
      case "Length":
      case "Keys":
      case "SetSize":
      case "DequeSize":
      case "HeapSize":
      case "HeapPeek":
      case "StringLength":
      case "StringTrim":
      case "StringUpper":
      case "StringLower":
        sub("base");
        break;
      case "Map": {
        const items = node.items;
        if (!Array.isArray(items)) {
          add(`${path}.items`, "missing or invalid items");
          break;
        }
        items.forEach((item, i) => {
          const p = `${path}.items[${i}]`;
          if (!isNode(item)) {
            add(p, "map item must be an object with key and value");
            return;
          }
          if (!("key" in item)) add(`${p}.key`, "missing key");
          else expr(item.key, `${p}.key`, scope);
          if (!("value" in item)) add(`${p}.value`, "missing value");
          else expr(item.value, `${p}.value`, scope);
        });
        break;
      }
      case "Get":
        sub("base");
        sub("key");
        break;
      case "GetDefault":
        sub("base");
        sub("key");
        sub("default");
        break;
      case "Record": {
        const fields = node.fields;
        if (!Array.isArray(fields)) {
          add(`${path}.fields`, "missing or invalid fields");
          break;
        }
        const seen = new Set<string>();
        fields.forEach((field, i) => {
          const p = `${path}.fields[${i}]`;
          if (!isNode(field)) {
            add(p, "record field must be an object with name and value");
            return;
          }
          if (!isNonEmptyString(field.name)) {
            add(`${p}.name`, "missing or invalid name");
          } else if (seen.has(field.name)) {
            add(`${p}.name`, `duplicate field '${field.name}'`);
          } else {
            seen.add(field.name);
          }
          if (!("value" in field)) add(`${p}.value`, "missing value");
          else expr(field.value, `${p}.value`, scope);
        });
        break;
      }
      case "GetField":
        sub("base");
        name("name");
        break;
      case "SetHas":
        sub("base");
        sub("value");
        break;
      case "DequeNew":
      case "HeapNew":
        break;
      case "Join":
        sub("sep");
        sub("items");
        break;
      case "StringSplit":
        sub("base");
        sub("delimiter");
        break;
      case "StringStartsWith":
        sub("base");
        sub("prefix");
        break;
      case "StringEndsWith":
        sub("base");
        sub("suffix");
        break;
      case "StringContains":
        sub("base");
        sub("substring");
        break;
      case "StringReplace":
        sub("base");
        sub("old");
        sub("new");
        break;
      case "Math":
        if (!isMathOp(node.op)) add(`${path}.op`, "missing or invalid op");
        sub("arg");
        break;
      case "MathPow":
        sub("base");
        sub("exponent");
        break;
      case "MathConst":
        if (!isMathConst(node.name)) add(`${path}.name`, "missing or invalid name (expected 'pi' or 'e')");
        break;
      case "JsonParse":
        sub("source");
        break;
      case "JsonStringify":
        sub("value");
        optSub("pretty");
        break;
      case "RegexMatch":
      case "RegexFindAll":
        sub("string");
        sub("pattern");
        optSub("flags");
        break;
      case "RegexReplace":
        sub("string");
        sub("pattern");
        sub("replacement");
        optSub("flags");
        break;
      case "RegexSplit":
        sub("string");
        sub("pattern");
        optSub("flags");
        optSub("maxsplit");
        break;
      case "ToInt":
      case "ToFloat":
      case "ToString":
        sub("value");
        break;
      case "ExternalCall":
        name("module");
        name("function");
        list("args");
        break;
      case "MethodCall":
        sub("object");
        name("method");
        list("args");
        break;
      case "PropertyGet":
        sub("object");
        name("property");
        break;
    }
  };

  const literalIndex = (index: unknown, path: string): void => {
    if (!isNode(index) || index.type !== "Literal") return;
    const v = index.value;
    if (!isInteger(v) && typeof v !== "bigint") {
      add(path, "index must be an integer");
    } else if (v < 0 && !supportsFeature(effectiveVersion, NEGATIVE_INDEX_SINCE)) {
      add(path, "index must be a non-negative integer");
    }
  };

  const callNode = (node: Node, path: string, scope: Scope): void => {
    const n = node.name;
    if (!isNonEmptyString(n) || !CALL_NAME.test(n)) {
      add(`${path}.name`, "missing or invalid name");
    } else if (sealed && isLegacyHelper(n)) {
      add(
        `${path}.name`,
        `helper function '${n}' is not allowed in ${effectiveVersion}; use explicit primitives (GetDefault, Keys, Push, Tuple)`,
      );
    }
    const args = node.args;
    if (!Array.isArray(args)) {
      add(`${path}.args`, "missing or invalid args");
      return;
    }
    args.forEach((arg, i) => expr(arg, `${path}.args[${i}]`, scope));
  };

  // ── statements ──

  const identifier = (node: Node, key: string, path: string): string | undefined => {
    const v = node[key];
    if (!isNonEmptyString(v)) {
      add(`${path}.${key}`, `missing or invalid ${key}`);
      return undefined;
    }
    if (!IDENTIFIER.test(v)) {
      add(`${path}.${key}`, `invalid identifier '${v}'`);
      return undefined;
    }
    return v;
  };

  const block = (stmts: unknown, path: string, scope: Scope, what: string): void => {
    if (!Array.isArray(stmts)) {
      add(path, `missing or invalid ${what}`);
      return;
    }
    stmts.forEach((s, i) => stmt(s, `${path}[${i}]`, scope));
  };

  const nested = (scope: Scope, patch: Partial<Scope>): Scope => ({ ...scope, topLevel: false, ...patch });

  const stmt = (node: unknown, path: string, scope: Scope): void => {
    if (!isNode(node)) {
      add(path, "expected statement object");
      return;
    }
    const type = node.type;
    if (typeof type !== "string") {
      add(`${path}.type`, "missing type");
      return;
    }
    const since = stmtSince(type);
    if (since === undefined) {
      add(`${path}.type`, `unknown type '${type}'`);
      return;
    }
    if (!supportsFeature(effectiveVersion, since)) {
      add(`${path}.type`, `'${type}' requires ${since} or later`);
    }

    const sub = (key: string): void => {
      if (!(key in node)) {
        add(`${path}.${key}`, `missing ${key}`);
        return;
      }
      expr(node[key], `${path}.${key}`, scope);
    };
    const inner = nested(scope, {});

    switch (type) {
      case "Let":
      case "Assign": {
        const n = identifier(node, "name", path);
        sub("value");
        if (n) scope.defined.add(n);
        break;
      }
      case "If":
        sub("test");
        block(node.then, `${path}.then`, inner, "then");
        if (node.else !== undefined) block(node.else, `${path}.else`, inner, "else");
        break;
      case "While":
        sub("test");
        block(node.body, `${path}.body`, nested(scope, { loopDepth: scope.loopDepth + 1 }), "body");
        break;
      case "For": {
        const v = identifier(node, "var", path);
        const iter = node.iter;
        if (isNode(iter) && iter.type === "Range") {
          range(iter, `${path}.iter`, scope);
        } else if (!("iter" in node)) {
          add(`${path}.iter`, "missing iter");
        } else {
          expr(iter, `${path}.iter`, scope);
        }
        if (v) scope.defined.add(v);
        block(node.body, `${path}.body`, nested(scope, { loopDepth: scope.loopDepth + 1 }), "body");
        break;
      }
      case "ForEach": {
        const v = identifier(node, "var", path);
        sub("iter");
        if (v) scope.defined.add(v);
        block(node.body, `${path}.body`, nested(scope, { loopDepth: scope.loopDepth + 1 }), "body");
        break;
      }
      case "Switch": {
        sub("test");
        const cases = node.cases;
        if (!Array.isArray(cases)) {
          add(`${path}.cases`, "missing or invalid cases");
        } else {
          cases.forEach((c, i) => {
            const p = `${path}.cases[${i}]`;
            if (!isNode(c)) {
              add(p, "case must be an object with value and body");
              return;
            }
            if (!("value" in c)) add(`${p}.value`, "missing value");
            else expr(c.value, `${p}.value`, scope);
            block(c.body, `${p}.body`, inner, "body");
          });
        }
        if (node.default !== undefined) block(node.default, `${path}.default`, inner, "default");
        break;
      }
      case "Break":
      case "Continue":
        if (scope.loopDepth === 0) add(path, `${type} is only allowed inside a loop`);
        break;
      case "Print":
        if (!Array.isArray(node.args)) {
          add(`${path}.args`, "missing or invalid args");
        } else {
          node.args.forEach((arg, i) => expr(arg, `${path}.args[${i}]`, scope));
        }
        break;
      case "Call":
        callNode(node, path, scope);
        break;
      case "FuncDef":
        funcDef(node, path, scope);
        break;
      case "Return":
        if (!scope.inFunc) add(path, "Return is only allowed inside FuncDef");
        if (node.value !== undefined && node.value !== null) expr(node.value, `${path}.value`, scope);
        break;
      case "SetIndex":
        sub("base");
        sub("index");
        literalIndex(node.index, `${path}.index`);
        sub("value");
        break;
      case "Set":
        sub("base");
        sub("key");
        sub("value");
        break;
      case "Push":
      case "SetAdd":
      case "SetRemove":
      case "PushBack":
      case "PushFront":
        sub("base");
        sub("value");
        break;
      case "SetField":
        sub("base");
        if (!isNonEmptyString(node.name)) add(`${path}.name`, "missing or invalid name");
        sub("value");
        break;
      case "PopFront":
      case "PopBack":
      case "HeapPop": {
        sub("base");
        const t = identifier(node, "target", path);
        if (t) scope.defined.add(t);
        break;
      }
      case "HeapPush":
        sub("base");
        sub("priority");
        sub("value");
        break;
      case "TryCatch": {
        block(node.body, `${path}.body`, inner, "body");
        const cv = identifier(node, "catch_var", path);
        if (cv) scope.defined.add(cv);
        block(node.catch_body, `${path}.catch_body`, inner, "catch_body");
        if (node.finally_body !== undefined) block(node.finally_body, `${path}.finally_body`, inner, "finally_body");
        break;
      }
      case "Throw":
        sub("message");
        break;
      case "Import": {
        if (!scope.topLevel) add(path, "Import is only allowed at the top level");
        const p = node.path;
        if (!isNonEmptyString(p) || !MODULE_PATH.test(p)) add(`${path}.path`, "missing or invalid path");
        if (node.alias !== undefined && (!isNonEmptyString(node.alias) || !IDENTIFIER.test(node.alias))) {
          add(`${path}.alias`, "invalid alias");
        }
        break;
      }
    }
  };

  const range = (node: Node, path: string, scope: Scope): void => {
    if (!supportsFeature(effectiveVersion, EXPR_SINCE.Range)) {
      add(`${path}.type`, `'Range' requires ${EXPR_SINCE.Range} or later`);
    }
    for (const key of ["from", "to"]) {
      if (!(key in node)) add(`${path}.${key}`, `missing ${key}`);
      else expr(node[key], `${path}.${key}`, scope);
    }
    if (node.inclusive !== undefined && typeof node.inclusive !== "boolean") {
      add(`${path}.inclusive`, "inclusive must be a boolean");
    }
  };

  const funcDef = (node: Node, path: string, scope: Scope): void => {
    if (!scope.topLevel) add(path, "FuncDef is only allowed at the top level");
    identifier(node, "name", path);
    const params = node.params;
    const paramNames: string[] = [];
    if (!Array.isArray(params)) {
      add(`${path}.params`, "missing or invalid params");
    } else {
      params.forEach((p, i) => {
        if (!isNonEmptyString(p) || !IDENTIFIER.test(p)) {
          add(`${path}.params[${i}]`, "parameter must be an identifier");
        } else if (paramNames.includes(p)) {
          add(`${path}.params[${i}]`, `duplicate parameter '${p}'`);
        } else {
          paramNames.push(p);
        }
      });
    }
    // Names the body binds are locals for the whole body, so a read that
    // precedes the binding cannot fall back to a global of the same name.
    const locals = Array.isArray(node.body) ? localNamesOf(node.body) : new Set<string>();
    const defined = new Set([...scope.defined].filter(n => !locals.has(n)));
    for (const p of paramNames) defined.add(p);
    block(node.body, `${path}.body`, { defined, loopDepth: 0, inFunc: true, topLevel: false }, "body");
  };

  const body = doc.body;
  if (!Array.isArray(body)) {
    add("$.body", "missing or invalid body");
  } else {
    const top: Scope = { defined: new Set(), loopDepth: 0, inFunc: false, topLevel: true };
    body.forEach((s, i) => stmt(s, `$.body[${i}]`, top));
    const functionNames = new Set<string>();
    body.forEach((s, i) => {
      if (!isNode(s) || s.type !== "FuncDef" || typeof s.name !== "string") return;
      if (functionNames.has(s.name)) add(`$.body[${i}].name`, `duplicate function '${s.name}'`);
      functionNames.add(s.name);
    });
  }

  if (doc.ambiguities !== undefined) validateAmbiguities(doc.ambiguities, add);
  if (doc.source_map !== undefined) {
    validateSourceMap(doc.source_map, Array.isArray(body) ? body.length : 0, add);
  }

  return errors;
}

/** Names bound anywhere inside an untyped statement list, excluding nested function bodies. */
function localNamesOf(stmts: unknown[]): Set<string> {
  const names = new Set<string>();
  const walk = (list: unknown): void => {
    if (!Array.isArray(list)) return;
    for (const s of list) {
      if (!isNode(s) || s.type === "FuncDef") continue;
      for (const key of ["name", "var", "target", "catch_var"]) {
        const bindsKey =
          (key === "name" && (s.type === "Let" || s.type === "Assign")) ||
          (key === "var" && (s.type === "For" || s.type === "ForEach")) ||
          (key === "target" && (s.type === "PopFront" || s.type === "PopBack" || s.type === "HeapPop")) ||
          (key === "catch_var" && s.type === "TryCatch");
        const v = s[key];
        if (bindsKey && typeof v === "string") names.add(v);
      }
      for (const key of ["then", "else", "body", "default", "catch_body", "finally_body"]) walk(s[key]);
      if (Array.isArray(s.cases)) {
        for (const c of s.cases) if (isNode(c)) walk(c.body);
      }
    }
  };
  walk(stmts);
  return names;
}

function validateAmbiguities(value: unknown, add: (path: string, message: string) => void): void {
  if (!Array.isArray(value)) {
    add("$.ambiguities", "ambiguities must be a list");
    return;
  }
  value.forEach((amb, i) => {
    const path = `$.ambiguities[${i}]`;
    if (!isNode(amb)) {
      add(path, "ambiguity must be an object");
      return;
    }
    if (!isNonEmptyString(amb.question)) add(`${path}.question`, "question must be a non-empty string");
    const options = amb.options;
    if (!Array.isArray(options) || options.length === 0) {
      add(`${path}.options`, "options must be a non-empty list");
    } else {
      options.forEach((opt, j) => {
        if (!isNonEmptyString(opt)) add(`${path}.options[${j}]`, "option must be a non-empty string");
      });
    }
    const def = amb.default;
    if (!isInteger(def)) {
      add(`${path}.default`, "default must be an integer");
    } else if (Array.isArray(options) && (def < 0 || def >= options.length)) {
      add(`${path}.default`, "default must index into options");
    }
  });
}

function validateSourceMap(
  value: unknown,
  bodyLength: number,
  add: (path: string, message: string) => void,
): void {
  if (!isNode(value)) {
    add("$.source_map", "source_map must be an object");
    return;
  }
  const owner = new Map<number, string>();
  for (const [key, indices] of Object.entries(value)) {
    const path = `$.source_map.${key}`;
    if (!/^-?\d+$/.test(key)) {
      add(path, `source_map key '${key}' must be a string integer`);
      continue;
    }
    if (parseInt(key, 10) < 1) {
      add(path, `source_map key '${key}' must be a positive integer`);
      continue;
    }
    if (!Array.isArray(indices)) {
      add(path, "source_map value must be a list of body indices");
      continue;
    }
    indices.forEach((idx, i) => {
      const p = `${path}[${i}]`;
      if (!isInteger(idx) || idx < 0) {
        add(p, "body index must be a non-negative integer");
      } else if (idx >= bodyLength) {
        add(p, `body index ${idx} is out of range (body has ${bodyLength} statements)`);
      } else if (owner.has(idx) && owner.get(idx) !== key) {
        add(p, `body index ${idx} appears in multiple source_map entries`);
      } else {
        owner.set(idx, key);
      }
    });
  }
}

/** Narrow a parsed value to a Document when it validates cleanly. */
export function isValidDocument(doc: unknown): doc is Document {
  return validate(doc).length === 0;
}

export function formatValidationErrors(errors: ValidationError[]): string {
  return errors.map(e => `${e.path}: ${e.message}`).join("\n");
}
