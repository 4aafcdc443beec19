// ─── Converter Registry ────────────────────────────────────────────
// A converter turns one checked token into an evaluation node of one
// runtime kind. Converters are indexed by the kind they produce, so a
// lookup for "a Character from RandomPick" only ever sees converters
// whose nodes really yield a Character.

import type { EvalNode } from "../runtime/node";
import type { ElementKind, RuntimeValues, ValueKind } from "../runtime/values";
import type { TypedAst } from "../typing/type-checker";
import type { CodeGenerator } from "./code-generator";

export interface ScalarConverter<K extends ValueKind> {
  readonly tokenType: string;
  readonly target: K;
  /** Narrows the match beyond the token type; defaults to always. */
  matches?(ast: TypedAst): boolean;
  convert(ast: TypedAst, generator: CodeGenerator): EvalNode<RuntimeValues[K]>;
}

export interface ArrayConverter<E extends ElementKind> {
  readonly tokenType: string;
  readonly element: E;
  matches?(ast: TypedAst): boolean;
  convert(ast: TypedAst, generator: CodeGenerator): EvalNode<readonly RuntimeValues[E][]>;
}

type ScalarTable = { [K in ValueKind]: ScalarConverter<K>[] };
type ArrayTable = { [E in ElementKind]: ArrayConverter<E>[] };

function matches(
  converter: { readonly tokenType: string; matches?(ast: TypedAst): boolean },
  ast: TypedAst
): boolean {
  return converter.tokenType === ast.token.type && (converter.matches?.(ast) ?? true);
}

export class ConverterRegistry {
  private readonly scalars: ScalarTable = {
    int: [],
    bool: [],
    character: [],
    characterHp: [],
    teamSide: [],
    action: [],
  };
  private readonly arrays: ArrayTable = {
    int: [],
    bool: [],
    character: [],
    characterHp: [],
    teamSide: [],
  };

  registerScalar<K extends ValueKind>(converter: ScalarConverter<K>): void {
    const list: ScalarConverter<K>[] = this.scalars[converter.target];
    list.push(converter);
  }

  registerArray<E extends ElementKind>(converter: ArrayConverter<E>): void {
    const list: ArrayConverter<E>[] = this.arrays[converter.element];
    list.push(converter);
  }

  /** The first registered converter producing `target` from this token. */
  findScalar<K extends ValueKind>(target: K, ast: TypedAst): ScalarConverter<K> | undefined {
    const list: ScalarConverter<K>[] = this.scalars[target];
    return list.find((converter) => matches(converter, ast));
  }

  findArray<E extends ElementKind>(element: E, ast: TypedAst): ArrayConverter<E> | undefined {
    const list: ArrayConverter<E>[] = this.arrays[element];
    return list.find((converter) => matches(converter, ast));
  }
}
