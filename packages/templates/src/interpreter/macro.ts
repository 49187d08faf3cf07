import type { MacroParam, Statement } from '../parser/ast-nodes';
import { TemplateObject, type Value } from '../runtime/values';

/**
 * A macro as a value: its parameter list, its body and the index of the
 * scope frame it was defined in. Calls go through the renderer, which owns
 * the arena the scope index points into.
 */
export class Macro extends TemplateObject {
  readonly typeName = 'macro';

  constructor(
    readonly name: string,
    readonly params: readonly MacroParam[],
    readonly body: readonly Statement[],
    readonly scope: number,
    readonly templateName: string,
  ) {
    super();
  }

  override isCallable(): boolean {
    return true;
  }

  override getAttribute(name: string): Value {
    switch (name) {
      case 'name':
        return this.name;
      case 'arguments':
        return this.params.map((param) => param.name);
      default:
        return undefined;
    }
  }

  override toString(): string {
    return `<macro ${this.name}>`;
  }
}
