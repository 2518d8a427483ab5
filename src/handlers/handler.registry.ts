import { Injectable, Logger } from '@nestjs/common';
import type { ActionHandler } from './handler.types';

@Injectable()
export class HandlerRegistry {
  private readonly logger = new Logger(HandlerRegistry.name);
  private readonly handlers = new Map<string, ActionHandler>();

  register(handler: ActionHandler): void {
    if (this.handlers.has(handler.name)) {
      throw new Error(`Handler "${handler.name}" is already registered`);
    }
    this.handlers.set(handler.name, handler);
    this.logger.log(`Registered handler "${handler.name}"`);
  }

  get(name: string): ActionHandler | undefined {
    return this.handlers.get(name);
  }

  has(name: string): boolean {
    return this.handlers.has(name);
  }

  /** Registered handlers in registration order. */
  list(): ActionHandler[] {
    return [...this.handlers.values()];
  }
}
