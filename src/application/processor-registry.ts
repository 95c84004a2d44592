import { UnsupportedEventTypeError } from '../domain/index.js';
import {
  createIssueCreatedProcessor,
  createIssueDeletedProcessor,
  createIssueUpdatedProcessor,
  createProjectCreatedProcessor,
  createProjectDeletedProcessor,
  createProjectUpdatedProcessor,
} from './processors/index.js';
import type { Processor } from './processors/index.js';

export const DEFAULT_EVENT_DOMAIN = 'jira';

/**
 * Read-only table from event-type tag to processor.
 *
 * Built once at startup; lookups are exact matches on the full tag
 * (`<domain>:<eventName>`). A new event type is one more processor in
 * the list handed to the constructor.
 */
export class ProcessorRegistry {
  private readonly table: ReadonlyMap<string, Processor>;

  constructor(processors: readonly Processor[], readonly domain: string = DEFAULT_EVENT_DOMAIN) {
    const table = new Map<string, Processor>();
    for (const processor of processors) {
      const eventType = `${domain}:${processor.eventName}`;
      if (table.has(eventType)) {
        throw new Error(`Duplicate processor registered for "${eventType}"`);
      }
      table.set(eventType, processor);
    }
    this.table = table;
  }

  /** Returns the processor for `eventType` or throws `UnsupportedEventTypeError`. */
  resolve(eventType: string): Processor {
    const processor = this.table.get(eventType);
    if (processor === undefined) {
      throw new UnsupportedEventTypeError(eventType);
    }
    return processor;
  }

  /** Registered tags, in registration order. */
  eventTypes(): string[] {
    return [...this.table.keys()];
  }

  /** The six project/issue processors. */
  static defaults(): Processor[] {
    return [
      createProjectCreatedProcessor(),
      createProjectUpdatedProcessor(),
      createProjectDeletedProcessor(),
      createIssueCreatedProcessor(),
      createIssueUpdatedProcessor(),
      createIssueDeletedProcessor(),
    ];
  }

  static withDefaults(domain: string = DEFAULT_EVENT_DOMAIN): ProcessorRegistry {
    return new ProcessorRegistry(ProcessorRegistry.defaults(), domain);
  }
}
