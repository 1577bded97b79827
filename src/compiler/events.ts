import { CompileTypeError, ModelError } from '../core/errors.js';
import { lengthVariableType } from '../automaton/variable.js';
import { describeType, isArrayType, scalarOf, unifyTypes, type DataType } from '../expression/types.js';

/** Events that other automata synchronise on explicitly; no self-loops are generated for them. */
const SYNCHED_EVENT_PATTERNS: readonly RegExp[] = [
  /^srv_.+_(response|request|req_client).*$/,
  /^action_.+_goal_.+$/,
  /^action_.+_result.*$/,
  /^action_.+_thread_(start|free)$/,
  /^bt_.+_(tick|halt|response|halt_response)$/,
];

/** Interfaces whose receivers are dropped when nobody sends them. */
const REMOVABLE_EVENT_PATTERNS: readonly RegExp[] = [/^action_.*_feedback$/, /^action_.*_goal_rejected$/, /^bt_.+_halt$/];

export function isEventSynched(name: string): boolean {
  return SYNCHED_EVENT_PATTERNS.some((re) => re.test(name));
}

export function isRemovableInterface(name: string): boolean {
  return REMOVABLE_EVENT_PATTERNS.some((re) => re.test(name));
}

export const sendAction = (event: string) => `${event}_on_send`;
export const receiveAction = (event: string) => `${event}_on_receive`;

export class ChartEvent {
  readonly name: string;
  private readonly fieldTypes = new Map<string, DataType>();
  private readonly declared: boolean;
  /** automaton → action */
  private readonly senderMap = new Map<string, string>();
  private readonly receiverMap = new Map<string, string>();

  constructor(name: string, fields?: ReadonlyMap<string, DataType>) {
    this.name = name;
    this.declared = fields !== undefined;
    for (const [field, type] of fields ?? []) this.fieldTypes.set(field, type);
  }

  get fields(): ReadonlyMap<string, DataType> {
    return this.fieldTypes;
  }

  fieldType(field: string): DataType | undefined {
    return this.fieldTypes.get(field);
  }

  /**
   * Merge the payload of one send into the event's structure.
   * Declared structures only accept their own fields; int and real widen to real.
   */
  recordPayload(payload: ReadonlyMap<string, DataType>): void {
    for (const [field, type] of payload) {
      const known = this.fieldTypes.get(field);
      if (!known) {
        if (this.declared) {
          throw new ModelError(`Event '${this.name}' has no field '${field}'`, {
            hint: `Declared fields: ${[...this.fieldTypes.keys()].join(', ') || 'none'}`,
          });
        }
        this.fieldTypes.set(field, type);
        continue;
      }
      const merged = unifyTypes(known, type);
      if (!merged || (this.declared && scalarOf(merged) !== scalarOf(known))) {
        throw new CompileTypeError(
          `Field '${field}' of event '${this.name}' is ${describeType(known)} but a sender provides ${describeType(type)}`
        );
      }
      if (!this.declared) this.fieldTypes.set(field, merged);
    }
  }

  addSender(automaton: string, action: string): void {
    this.senderMap.set(automaton, action);
  }

  addReceiver(automaton: string, action: string): void {
    this.receiverMap.set(automaton, action);
  }

  get senders(): ReadonlyMap<string, string> {
    return this.senderMap;
  }

  get receivers(): ReadonlyMap<string, string> {
    return this.receiverMap;
  }

  hasSenders(): boolean {
    return this.senderMap.size > 0;
  }

  hasReceivers(): boolean {
    return this.receiverMap.size > 0;
  }

  /** Receivers exist but nobody sends it, and the interface may be dropped. */
  isRemovable(): boolean {
    return !this.hasSenders() && isRemovableInterface(this.name);
  }
}

/** Every event of a model, shared by all chart compilations. */
export class EventsHolder {
  private readonly events = new Map<string, ChartEvent>();

  has(name: string): boolean {
    return this.events.has(name);
  }

  get(name: string): ChartEvent | undefined {
    return this.events.get(name);
  }

  /** The named event, created without a structure on first use. */
  ensure(name: string): ChartEvent {
    let event = this.events.get(name);
    if (!event) {
      event = new ChartEvent(name);
      this.events.set(name, event);
    }
    return event;
  }

  declare(name: string, fields: ReadonlyMap<string, DataType>): ChartEvent {
    if (this.events.has(name)) throw new ModelError(`Event '${name}' is declared twice`);
    const event = new ChartEvent(name, fields);
    this.events.set(name, event);
    return event;
  }

  all(): ChartEvent[] {
    return [...this.events.values()];
  }

  /**
   * Type of a global event variable such as `ev.x` or `ev.valid`.
   * Event names may contain dots, so every event is tried as a prefix.
   */
  variableType(name: string): DataType | undefined {
    for (const event of this.events.values()) {
      if (!name.startsWith(`${event.name}.`)) continue;
      const field = name.slice(event.name.length + 1);
      if (field === 'valid') return 'bool';
      const type = event.fieldType(field);
      if (type) return type;
      const companion = /^(.+)\.d(\d+)_len$/.exec(field);
      const arrayType = companion?.[1] ? event.fieldType(companion[1]) : undefined;
      if (companion && arrayType && isArrayType(arrayType)) {
        const dimension = Number(companion[2]);
        if (dimension >= 1 && dimension <= arrayType.maxSizes.length) return lengthVariableType(arrayType, dimension);
      }
    }
    return undefined;
  }
}
