import { Automaton } from '../automaton/automaton.js';
import { destination } from '../automaton/edge.js';
import { createVariable, lengthVariables, type Variable } from '../automaton/variable.js';
import { ModelError } from '../core/errors.js';
import { boolLiteral, realLiteral } from '../expression/model.js';
import { isArrayType } from '../expression/types.js';
import { receiveAction, sendAction, type ChartEvent, type EventsHolder } from '../compiler/events.js';
import { Composition } from './composition.js';
import type { Model } from './model.js';

const WAITING = 'waiting';
const RECEIVED = 'received';

/** Events that become part of the model; unused ones and dropped interfaces are left out. */
function liveEvents(model: Model, events: EventsHolder): ChartEvent[] {
  const live: ChartEvent[] = [];
  for (const event of events.all()) {
    if (event.hasSenders()) {
      live.push(event);
    } else if (event.hasReceivers()) {
      if (!event.isRemovable()) {
        const receivers = [...event.receivers.keys()].join(', ');
        throw new ModelError(`Event '${event.name}' is received by ${receivers} but never sent`, {
          hint: 'Send it from some chart, or remove the transitions waiting for it.',
        });
      }
      model.removeEdgesWithAction(receiveAction(event.name));
    }
  }
  return live;
}

/** One-place buffer: a send fills it, the receive that follows empties it. */
function eventAutomaton(event: ChartEvent): Automaton {
  const automaton = new Automaton(event.name);
  automaton.setInitialLocation(WAITING);
  const edge = (from: string, to: string, action: string) => ({
    location: from,
    action,
    destinations: [destination(to, [], realLiteral(1))],
  });
  if (event.hasReceivers()) {
    automaton.addEdge(edge(WAITING, RECEIVED, sendAction(event.name)));
    automaton.addEdge(edge(RECEIVED, WAITING, receiveAction(event.name)));
  } else {
    automaton.addEdge(edge(WAITING, WAITING, sendAction(event.name)));
  }
  return automaton;
}

/** `<event>.valid` and one global per payload field, arrays sized to the model capacity. */
export function eventVariables(event: ChartEvent): Variable[] {
  const variables = [createVariable(`${event.name}.valid`, 'bool', boolLiteral(false))];
  for (const [field, type] of event.fields) {
    const name = `${event.name}.${field}`;
    variables.push(createVariable(name, type));
    if (isArrayType(type)) variables.push(...lengthVariables(name, type));
  }
  return variables;
}

/**
 * Declare the globals of every event that takes part in the model.
 * Receivers of removable interfaces nobody sends are dropped on the way.
 */
export function declareEventVariables(model: Model, events: EventsHolder): ChartEvent[] {
  const live = liveEvents(model, events);
  for (const event of live) model.addVariables(eventVariables(event));
  return live;
}

/**
 * Turn the model's events into automata and synchronisation vectors. Every
 * chart automaton already in `model` and one automaton per event become
 * elements of the returned composition.
 */
export function buildEventSyncs(model: Model, events: readonly ChartEvent[]): Composition {
  const composition = new Composition(model.automata.map((automaton) => automaton.name));
  for (const event of events) {
    model.addAutomaton(eventAutomaton(event));
    composition.addElement(event.name);
    const send = sendAction(event.name);
    for (const sender of event.senders.keys()) {
      composition.addSync(send, { [event.name]: send, [sender]: send });
    }
    if (event.hasReceivers()) {
      const receive = receiveAction(event.name);
      const receivers = Object.fromEntries([...event.receivers.keys()].map((receiver) => [receiver, receive]));
      composition.addSync(receive, { [event.name]: receive, ...receivers });
    }
  }
  return composition;
}
