/**
 * Type references as written in source.
 *
 * Nothing here is resolved: a `Reference` is just a name plus generic arguments.
 */
export const BUILT_IN_TYPES = [
  'byte',
  'short',
  'int',
  'long',
  'float',
  'double',
  'bool',
  'string',
  'array',
  'any',
  'u8',
  'u16',
  'u32',
  'u64',
  'u128',
  'i8',
  'i16',
  'i32',
  'i64',
  'i128',
  'f32',
  'f64',
] as const;

export type BuiltInType = (typeof BUILT_IN_TYPES)[number];

export type TypeKind =
  | { kind: 'BuiltIn'; name: BuiltInType; element?: TypeKind }
  | { kind: 'Reference'; name: string; generics: TypeKind[] }
  | { kind: 'Union'; members: TypeKind[] }
  /** Reserved for types computed at run time; the parser never produces it. */
  | { kind: 'RuntimeType'; name: string };

const builtIns: ReadonlySet<string> = new Set(BUILT_IN_TYPES);

export function isBuiltInType(name: string): name is BuiltInType {
  return builtIns.has(name);
}

export function builtIn(name: BuiltInType, element?: TypeKind): TypeKind {
  return element === undefined ? { kind: 'BuiltIn', name } : { kind: 'BuiltIn', name, element };
}

export function typeToString(type: TypeKind): string {
  switch (type.kind) {
    case 'BuiltIn':
      return type.element ? `${type.name}<${typeToString(type.element)}>` : type.name;
    case 'Reference':
      return type.generics.length > 0
        ? `${type.name}<${type.generics.map(typeToString).join(', ')}>`
        : type.name;
    case 'Union':
      return type.members.map(typeToString).join(' | ');
    case 'RuntimeType':
      return `runtime ${type.name}`;
  }
}
