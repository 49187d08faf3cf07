import { EvalError } from '../errors';
import {
  NativeFunction,
  TemplateObject,
  equals,
  type Value,
  type ValueMap,
} from '../runtime/values';

/**
 * Renders a nested level of a recursive loop
 */
export type LoopRecursion = (items: Value) => Value;

/**
 * One run of a `{% for %}` loop. State shared across iterations
 * (`loop.changed`) lives here.
 */
export class LoopRun {
  lastChanged: Value[] | null = null;

  constructor(
    readonly items: readonly Value[],
    readonly depth0: number,
    readonly recurse: LoopRecursion | null,
  ) {}

  /** The `loop` variable for one iteration */
  at(position: number): LoopState {
    return new LoopState(this, position);
  }
}

/**
 * The `loop` variable inside `{% for %}`. Each iteration gets its own
 * instance, so a captured `loop` keeps the counters of the iteration it came
 * from.
 */
export class LoopState extends TemplateObject {
  readonly typeName = 'loop';

  constructor(
    private readonly run: LoopRun,
    private readonly position: number,
  ) {
    super();
  }

  override getAttribute(name: string): Value {
    const { items, depth0 } = this.run;
    const length = items.length;
    switch (name) {
      case 'index':
        return this.position + 1;
      case 'index0':
        return this.position;
      case 'revindex':
        return length - this.position;
      case 'revindex0':
        return length - this.position - 1;
      case 'first':
        return this.position === 0;
      case 'last':
        return this.position === length - 1;
      case 'length':
        return length;
      case 'depth':
        return depth0 + 1;
      case 'depth0':
        return depth0;
      case 'previtem':
        return this.position > 0 ? items[this.position - 1] : undefined;
      case 'nextitem':
        return this.position < length - 1 ? items[this.position + 1] : undefined;
      case 'cycle':
        return new NativeFunction('cycle', (args) => this.cycle(args));
      case 'changed':
        return new NativeFunction('changed', (args) => this.changed(args));
      default:
        return undefined;
    }
  }

  override isCallable(): boolean {
    return this.run.recurse !== null;
  }

  override invoke(args: Value[], _kwargs: ValueMap): Value {
    const { recurse } = this.run;
    if (recurse === null) {
      throw new EvalError("The loop must be marked 'recursive' to call it");
    }
    if (args.length !== 1) {
      throw new EvalError(`loop() takes exactly one argument (${args.length} given)`);
    }
    return recurse(args[0]);
  }

  private cycle(args: Value[]): Value {
    if (args.length === 0) {
      throw new EvalError('loop.cycle() requires at least one value');
    }
    return args[this.position % args.length];
  }

  private changed(args: Value[]): boolean {
    const previous = this.run.lastChanged;
    if (previous !== null && equals(previous, args)) {
      return false;
    }
    this.run.lastChanged = args;
    return true;
  }
}
