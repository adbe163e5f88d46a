/**
 * Math Expression AST (Abstract Syntax Tree)
 * Node types, usage collection, and formatting of parsed expressions
 */

import {
  type BinaryOperator,
  getOperatorPrecedence,
  isRightAssociative,
  NEGATION_PRECEDENCE,
} from "./operators.ts";

// =============================================================================
// AST NODE TYPES
// =============================================================================

/** AST node types */
export type ASTNodeType = "number" | "variable" | "call" | "unary" | "binary" | "array";

/** Base AST node: every node knows its span in the stripped source */
export interface ASTNodeBase {
  type: ASTNodeType;
  start: number;
  end: number;
  /** Written inside parentheses in the source */
  grouped?: boolean;
}

/** Number literal node */
export interface NumberNode extends ASTNodeBase {
  type: "number";
  value: number;
  /** Literal text, kept for formatting */
  text: string;
  suffix?: string;
}

/** Variable reference node */
export interface VariableNode extends ASTNodeBase {
  type: "variable";
  name: string;
}

/** Function call node */
export interface CallNode extends ASTNodeBase {
  type: "call";
  name: string;
  args: ASTNode[];
}

/** Negation node */
export interface UnaryNode extends ASTNodeBase {
  type: "unary";
  operator: "-";
  operand: ASTNode;
}

/** Binary operation node */
export interface BinaryNode extends ASTNodeBase {
  type: "binary";
  operator: BinaryOperator;
  left: ASTNode;
  right: ASTNode;
}

/** Vector/matrix literal node: [a, b] or [[a, b], [c, d]] */
export interface ArrayNode extends ASTNodeBase {
  type: "array";
  items: ASTNode[];
}

/** Union of all AST node types */
export type ASTNode = NumberNode | VariableNode | CallNode | UnaryNode | BinaryNode | ArrayNode;

// =============================================================================
// USAGE
// =============================================================================

/** Names an expression refers to, by role */
export interface ExpressionUsage {
  variables: ReadonlySet<string>;
  functions: ReadonlySet<string>;
  suffixes: ReadonlySet<string>;
}

/** Collect every variable, function and suffix name in an AST */
export function collectUsage(node: ASTNode): ExpressionUsage {
  const variables = new Set<string>();
  const functions = new Set<string>();
  const suffixes = new Set<string>();

  function traverse(n: ASTNode): void {
    switch (n.type) {
      case "number":
        if (n.suffix !== undefined) suffixes.add(n.suffix);
        break;
      case "variable":
        variables.add(n.name);
        break;
      case "call":
        functions.add(n.name);
        n.args.forEach(traverse);
        break;
      case "unary":
        traverse(n.operand);
        break;
      case "binary":
        traverse(n.left);
        traverse(n.right);
        break;
      case "array":
        n.items.forEach(traverse);
        break;
    }
  }

  traverse(node);
  return { variables, functions, suffixes };
}

// =============================================================================
// AST FORMATTING
// =============================================================================

/**
 * Format an AST back to a string, adding parentheses only where needed
 *
 * @example
 * formatAST(parse("(a+b)*c").ast);  // "(a + b) * c"
 */
export function formatAST(node: ASTNode): string {
  switch (node.type) {
    case "number":
      return node.text + (node.suffix ?? "");
    case "variable":
      return node.name;
    case "call":
      return `${node.name}(${node.args.map(formatAST).join(", ")})`;
    case "array":
      return `[${node.items.map(formatAST).join(", ")}]`;
    case "unary": {
      const operand = formatAST(node.operand);
      const needsParens =
        node.operand.type === "binary" && getOperatorPrecedence(node.operand.operator) < NEGATION_PRECEDENCE;
      return needsParens ? `-(${operand})` : `-${operand}`;
    }
    case "binary":
      return formatBinary(node);
  }
}

function formatBinary(node: BinaryNode): string {
  const prec = getOperatorPrecedence(node.operator);
  const rightAssoc = isRightAssociative(node.operator);

  const wrap = (child: ASTNode, isRight: boolean): string => {
    const text = formatAST(child);
    if (child.type === "unary") {
      return prec > getOperatorPrecedence("+") && !(rightAssoc && isRight) ? `(${text})` : text;
    }
    if (child.type !== "binary") return text;
    const childPrec = getOperatorPrecedence(child.operator);
    const needsParens =
      childPrec < prec ||
      (childPrec === prec && (rightAssoc ? !isRight : isRight && !isCommutative(node.operator)));
    return needsParens ? `(${text})` : text;
  };

  const left = wrap(node.left, false);
  const right = wrap(node.right, true);
  if (node.operator === "^") return `${left}^${right}`;
  return `${left} ${node.operator} ${right}`;
}

function isCommutative(op: BinaryOperator): boolean {
  return op === "+" || op === "*" || op === "||";
}
