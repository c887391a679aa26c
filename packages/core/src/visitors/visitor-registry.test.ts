import ts from 'typescript';
import { describe, it, expect } from 'vitest';

import { detectCapabilities, VisitorRegistrationError, VisitorRegistry } from './visitor-registry.js';
import { traverseNodes } from './node-traversal.js';

import type { SurveyVisitor } from './types.js';

class CountingVisitor implements SurveyVisitor {
  count = 0;
  postAnalysis(): 'continue' {
    this.count++;
    return 'continue';
  }
}

describe('detectCapabilities', () => {
  it('reports nothing for an empty visitor', () => {
    expect(detectCapabilities({})).toEqual({
      preAnalysis: false,
      fileContext: false,
      nodeVisiting: false,
      errorReporting: false,
      postAnalysis: false,
      runFinished: false,
    });
  });

  it('detects implemented hooks, including class methods', () => {
    const capabilities = detectCapabilities(new CountingVisitor());
    expect(capabilities.postAnalysis).toBe(true);
    expect(capabilities.preAnalysis).toBe(false);
  });

  it('requires at least one node callback for node visiting', () => {
    expect(detectCapabilities({ nodeVisitors: {} }).nodeVisiting).toBe(false);
    expect(detectCapabilities({ nodeVisitors: { [ts.SyntaxKind.Identifier]: () => undefined } }).nodeVisiting).toBe(
      true
    );
  });
});

describe('VisitorRegistry', () => {
  it('names visitors by name property, constructor, then position', () => {
    const registry = new VisitorRegistry();

    const named = registry.register({ name: 'named' });
    const classy = registry.register(new CountingVisitor());
    const anonymous = registry.register({});

    expect([named.name, classy.name, anonymous.name]).toEqual(['named', 'CountingVisitor', 'visitor#3']);
    expect(registry.list().map((entry) => entry.order)).toEqual([0, 1, 2]);
    expect(registry.size).toBe(3);
  });

  it('rejects the same instance twice', () => {
    const registry = new VisitorRegistry();
    const visitor = new CountingVisitor();
    registry.register(visitor);

    expect(() => registry.register(visitor, { name: 'again' })).toThrow(VisitorRegistrationError);
  });

  it('rejects duplicate names', () => {
    const registry = new VisitorRegistry();
    registry.register({ name: 'x' });

    expect(() => registry.register({ name: 'x' })).toThrow("A visitor named 'x' is already registered");
  });

  it('builds a dispatch table in registration order', () => {
    const registry = new VisitorRegistry();
    const first = registry.register({ name: 'first', nodeVisitors: { [ts.SyntaxKind.Identifier]: () => undefined } });
    const second = registry.register({
      name: 'second',
      nodeVisitors: {
        [ts.SyntaxKind.Identifier]: () => undefined,
        [ts.SyntaxKind.CallExpression]: () => undefined,
      },
    });
    registry.register({ name: 'none' });

    const dispatch = registry.buildNodeDispatch();

    expect(dispatch.get(ts.SyntaxKind.Identifier)?.map((entry) => entry.registered)).toEqual([first, second]);
    expect(dispatch.get(ts.SyntaxKind.CallExpression)?.map((entry) => entry.registered)).toEqual([second]);
    expect(dispatch.size).toBe(2);
  });
});

describe('traverseNodes', () => {
  it('hands matching nodes over depth-first in document order', () => {
    const sourceFile = ts.createSourceFile(
      'a.ts',
      'const alpha = beta(gamma);\nfunction delta() {}\n',
      ts.ScriptTarget.ES2022,
      true
    );
    const registry = new VisitorRegistry();
    registry.register({ name: 'ids', nodeVisitors: { [ts.SyntaxKind.Identifier]: () => undefined } });
    const names: string[] = [];

    const visited = traverseNodes(sourceFile, registry.buildNodeDispatch(), (entry, node) => {
      expect(entry.registered.name).toBe('ids');
      if (ts.isIdentifier(node)) {names.push(node.text);}
    });

    expect(names).toEqual(['alpha', 'beta', 'gamma', 'delta']);
    expect(visited).toBeGreaterThan(names.length);
  });
});
