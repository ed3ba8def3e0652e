import * as AST from './ast';

const INDENT = '    ';

// Binding strength of each tier, loosest first
const PRECEDENCE: Record<string, number> = {
  '||': 1,
  '&&': 2,
  '==': 3, '!=': 3,
  '<': 4, '<=': 4, '>': 4, '>=': 4,
  '+': 5, '-': 5,
  '*': 6, '/': 6, '%': 6,
};
const UNARY_PRECEDENCE = 7;
const CALL_PRECEDENCE = 8;

/**
 * Render a program in canonical Loa source form. Parsing the result yields
 * the same tree (positions aside).
 */
export function format(program: AST.Program): string {
  const lines: string[] = [];
  formatBlock(program.body, 0, lines);
  return lines.map(line => line + '\n').join('');
}

function formatBlock(body: AST.Statement[], depth: number, out: string[]): void {
  for (const stmt of body) {
    formatStatement(stmt, depth, out);
  }
}

function formatStatement(stmt: AST.Statement, depth: number, out: string[]): void {
  const pad = INDENT.repeat(depth);

  switch (stmt.type) {
    case 'PrintStatement':
      out.push(`${pad}print(${stmt.args.map(arg => formatExpression(arg)).join(', ')})`);
      break;
    case 'Assignment':
      out.push(`${pad}${stmt.target.name} = ${formatExpression(stmt.value)}`);
      break;
    case 'IfStatement':
      stmt.branches.forEach((branch, i) => {
        const keyword = i === 0 ? 'if' : 'else if';
        out.push(`${pad}${keyword} (${formatExpression(branch.condition)}):`);
        formatBlock(branch.body, depth + 1, out);
      });
      if (stmt.elseBody) {
        out.push(`${pad}else:`);
        formatBlock(stmt.elseBody, depth + 1, out);
      }
      break;
    case 'WhileStatement':
      out.push(`${pad}while (${formatExpression(stmt.condition)}):`);
      formatBlock(stmt.body, depth + 1, out);
      break;
    case 'FunctionDef':
      out.push(`${pad}fun ${stmt.name}(${stmt.params.join(', ')}):`);
      formatBlock(stmt.body, depth + 1, out);
      break;
    case 'ReturnStatement':
      out.push(stmt.value ? `${pad}return ${formatExpression(stmt.value)}` : `${pad}return`);
      break;
    case 'BreakStatement':
      out.push(`${pad}break`);
      break;
    case 'ContinueStatement':
      out.push(`${pad}continue`);
      break;
    case 'ExpressionStatement':
      out.push(`${pad}${formatExpression(stmt.expression)}`);
      break;
  }
}

/**
 * Render an expression, adding parentheses only where the surrounding
 * context binds tighter than the expression itself.
 */
export function formatExpression(expr: AST.Expression, minPrecedence = 0): string {
  switch (expr.type) {
    case 'NumberLiteral':
      return expr.raw;
    case 'StringLiteral':
      return quote(expr.value);
    case 'BooleanLiteral':
      return String(expr.value);
    case 'NilLiteral':
      return 'nil';
    case 'Identifier':
      return expr.name;
    case 'BinaryExpression':
    case 'LogicalExpression': {
      const precedence = PRECEDENCE[expr.operator];
      const left = formatExpression(expr.left, precedence);
      const right = formatExpression(expr.right, precedence + 1);
      return wrap(`${left} ${expr.operator} ${right}`, precedence < minPrecedence);
    }
    case 'UnaryExpression':
      return wrap(`${expr.operator}${formatExpression(expr.operand, UNARY_PRECEDENCE)}`, UNARY_PRECEDENCE < minPrecedence);
    case 'CallExpression': {
      const args = expr.args.map(arg => formatExpression(arg)).join(', ');
      return `${formatExpression(expr.callee, CALL_PRECEDENCE)}(${args})`;
    }
  }
}

function wrap(text: string, parenthesize: boolean): string {
  return parenthesize ? `(${text})` : text;
}

function quote(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\t/g, '\\t')
    .replace(/\r/g, '\\r');
  return `"${escaped}"`;
}
