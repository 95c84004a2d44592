import { describe, it, expect, vi } from 'vitest';
import { ProcessorRegistry } from '../../src/application/processor-registry.js';
import type { Processor } from '../../src/application/index.js';
import { UnsupportedEventTypeError } from '../../src/domain/index.js';

function stubProcessor(eventName: string): Processor {
  return {
    eventName,
    kind: 'issue',
    operation: 'updated',
    process: vi.fn(),
  };
}

describe('ProcessorRegistry', () => {
  it('registers the six default processors under the jira domain', () => {
    const registry = ProcessorRegistry.withDefaults();

    expect(registry.eventTypes()).toEqual([
      'jira:project_created',
      'jira:project_updated',
      'jira:project_deleted',
      'jira:issue_created',
      'jira:issue_updated',
      'jira:issue_deleted',
    ]);
  });

  it('resolves a processor by exact tag', () => {
    const registry = ProcessorRegistry.withDefaults();
    const processor = registry.resolve('jira:issue_deleted');

    expect(processor.kind).toBe('issue');
    expect(processor.operation).toBe('deleted');
  });

  it('throws UnsupportedEventTypeError for an unknown tag', () => {
    const registry = ProcessorRegistry.withDefaults();

    expect(() => registry.resolve('jira:widget_frobnicated')).toThrow(UnsupportedEventTypeError);
    expect(() => registry.resolve('jira:widget_frobnicated')).toThrow(
      'Unsupported event type "jira:widget_frobnicated"',
    );
  });

  it('does not match on prefix, suffix or case', () => {
    const registry = ProcessorRegistry.withDefaults();

    for (const tag of ['issue_created', 'jira:issue_created_v2', 'JIRA:issue_created', 'other:issue_created']) {
      expect(() => registry.resolve(tag)).toThrow(UnsupportedEventTypeError);
    }
  });

  it('prefixes a configured event domain', () => {
    const registry = ProcessorRegistry.withDefaults('tracker');

    expect(registry.resolve('tracker:project_created').operation).toBe('created');
    expect(() => registry.resolve('jira:project_created')).toThrow(UnsupportedEventTypeError);
  });

  it('adds a new event type by registering one more processor', () => {
    const comment = stubProcessor('comment_created');
    const registry = new ProcessorRegistry([...ProcessorRegistry.defaults(), comment]);

    expect(registry.resolve('jira:comment_created')).toBe(comment);
    expect(registry.eventTypes()).toHaveLength(7);
  });

  it('refuses two processors for the same tag', () => {
    expect(
      () => new ProcessorRegistry([stubProcessor('issue_updated'), stubProcessor('issue_updated')]),
    ).toThrow('Duplicate processor registered for "jira:issue_updated"');
  });
});
