import type { AstBody, Expression, FunctionDecl, Node, Path, Statement, Variable } from './ast.js';
import { typeToString } from './types.js';

function printPath(path: Path): string {
  return [path.name, ...path.parts].join('\\');
}

function printArgs(args: readonly Expression[]): string {
  return args.map(printExpression).join(', ');
}

function printVariable(keyword: string, v: Variable): string {
  const type = v.type ? `: ${typeToString(v.type)}` : '';
  const init = v.assignment ? ` = ${printExpression(v.assignment)}` : '';
  return `${keyword} ${v.name}${type}${init}`;
}

function printFunction(f: FunctionDecl): string {
  const inputs = f.inputs.map((i) => `${i.name}: ${typeToString(i.type)}`).join(', ');
  const ret = f.returnType ? `: ${typeToString(f.returnType)}` : '';
  const body = f.body.kind === 'Block' ? ` { ${f.body.body.length} }` : '';
  return `function ${f.name ?? '<anonymous>'}(${inputs})${ret}${body}`;
}

/**
 * Fully parenthesised rendering of an expression, so operator grouping is visible.
 */
export function printExpression(e: Expression): string {
  switch (e.kind) {
    case 'Literal':
      return e.literal === 'string' ? JSON.stringify(e.value) : e.value;
    case 'Operation':
      return `(${printExpression(e.left)} ${e.operator} ${printExpression(e.right)})`;
    case 'Call':
      return `${e.name}(${printArgs(e.args)})`;
    case 'MethodCall':
      return `${printExpression(e.target)}.${e.name}(${printArgs(e.args)})`;
    case 'New':
      return `new ${e.name}(${printArgs(e.args)})`;
    case 'Array':
      return `[${printArgs(e.items)}]`;
    case 'Object':
      return `{${e.entries.map((en) => `${en.key}: ${printExpression(en.value)}`).join(', ')}}`;
    case 'Member':
      return `${e.name}${e.accessor}${printExpression(e.member)}`;
    case 'Await':
      return `await ${printExpression(e.value)}`;
    case 'Statement':
      return printStatement(e.statement);
    case 'EndOfLine':
      return ';';
  }
}

/**
 * One-line summary of a statement. Bodies are shown as their item count.
 */
export function printStatement(s: Statement): string {
  switch (s.kind) {
    case 'Var':
      return printVariable('var', s.variable);
    case 'Const':
      return printVariable('const', s.variable);
    case 'Static':
      return `${s.visibility} static ${printStatement(s.statement)}`;
    case 'Function':
      return printFunction(s.func);
    case 'Class': {
      const { cls } = s;
      const ext = cls.extends ? ` extends ${cls.extends}` : '';
      const impl = cls.implements ? ` implements ${cls.implements.join(', ')}` : '';
      const { properties, methods, other } = cls.body;
      return `class ${cls.name}${ext}${impl} { properties: ${properties.length}, methods: ${methods.length}, other: ${other.length} }`;
    }
    case 'Block':
      return `{ ${s.body.length} }`;
    case 'Import':
      return `import ${printPath(s.path)}`;
    case 'Namespace':
      return s.body ? `namespace ${printPath(s.path)} ${printStatement(s.body)}` : `namespace ${printPath(s.path)}`;
    case 'TypeDef': {
      const params = s.params.length > 0 ? `<${s.params.join(', ')}>` : '';
      return `type ${s.name}${params} = ${typeToString(s.type)}`;
    }
    case 'Return':
      return s.value ? `return ${printExpression(s.value)}` : 'return';
    case 'MacroInvocation':
      return `${s.name}!(${printArgs(s.args)})`;
  }
}

export function printNode(node: Node): string {
  return node.inner.kind === 'Statement'
    ? printStatement(node.inner.statement)
    : printExpression(node.inner.expression);
}

/** One line per top-level node: `start..end  summary`. */
export function printBody(body: AstBody): string {
  return body
    .getProgram()
    .map((n) => `${n.range.start}..${n.range.end}  ${printNode(n)}\n`)
    .join('');
}
