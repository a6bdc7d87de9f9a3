import { z } from 'zod';
import { Dispatcher, Handler, handler } from './types.js';

const Operands = z.object({ a: z.number(), b: z.number() });

export interface DemoEvent {
  name: string;
  at: string;
}

/**
 * Fixed in-memory handlers for trying the gateway from an ExtJS client or
 * curl. `Log.event` is meant to be called as a notification (tid null).
 */
export class DemoDispatcher implements Dispatcher {
  readonly events: DemoEvent[] = [];
  private handlers = new Map<string, Handler>();

  constructor() {
    this.handlers.set('Calc.add', handler(Operands, (args) => {
      if (!args) throw new Error('missing operands');
      return args.a + args.b;
    }));
    this.handlers.set('Calc.divide', handler(Operands, (args) => {
      if (!args) throw new Error('missing operands');
      if (args.b === 0) throw new Error('division by zero');
      return args.a / args.b;
    }));
    this.handlers.set('Echo.say', handler(z.unknown(), (args) => args));
    this.handlers.set('Log.event', handler(z.string(), (name) => {
      this.events.push({ name: name ?? 'unnamed', at: new Date().toISOString() });
    }));
  }

  lookup(key: string): Handler | undefined {
    return this.handlers.get(key);
  }

  keys(): string[] {
    return Array.from(this.handlers.keys());
  }
}
