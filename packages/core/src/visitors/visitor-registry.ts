/**
 * Visitor Registry - visitor registration and capability detection
 *
 * Capabilities are detected once, when a visitor is registered. The driver
 * only ever looks at the recorded flags, never at the visitor's type.
 */

import type ts from 'typescript';

import type {
  NodeVisitor,
  RegisteredVisitor,
  SurveyVisitor,
  VisitorCapabilities,
} from './types.js';

// ============================================================================
// Error Types
// ============================================================================

export class VisitorRegistrationError extends Error {
  constructor(
    message: string,
    public readonly visitorName: string
  ) {
    super(message);
    this.name = 'VisitorRegistrationError';
  }
}

// ============================================================================
// Capability Detection
// ============================================================================

export function detectCapabilities(visitor: SurveyVisitor): VisitorCapabilities {
  const nodeVisitors = visitor.nodeVisitors;
  return Object.freeze({
    preAnalysis: typeof visitor.preAnalysis === 'function',
    fileContext: typeof visitor.setFileContext === 'function',
    nodeVisiting:
      nodeVisitors !== undefined &&
      Object.values(nodeVisitors).some((fn) => typeof fn === 'function'),
    errorReporting: typeof visitor.reportErrors === 'function',
    postAnalysis: typeof visitor.postAnalysis === 'function',
    runFinished: typeof visitor.onRunFinished === 'function',
  });
}

function defaultName(visitor: SurveyVisitor, order: number): string {
  if (visitor.name) {
    return visitor.name;
  }
  const ctorName = visitor.constructor.name;
  return ctorName && ctorName !== 'Object' ? ctorName : `visitor#${order + 1}`;
}

// ============================================================================
// Node Dispatch
// ============================================================================

export interface NodeDispatchEntry {
  readonly registered: RegisteredVisitor;
  readonly visit: NodeVisitor;
}

/**
 * Syntax kind -> node callbacks, in registration order
 */
export type NodeDispatchMap = ReadonlyMap<ts.SyntaxKind, readonly NodeDispatchEntry[]>;

// ============================================================================
// Visitor Registry
// ============================================================================

/**
 * @example
 * ```typescript
 * const registry = new VisitorRegistry();
 * registry.register(new ErrorSurveyor({ formatter }));
 * registry.register({ name: 'counter', postAnalysis: () => 'continue' });
 * ```
 */
export class VisitorRegistry {
  private readonly entries: RegisteredVisitor[] = [];

  /**
   * Register a visitor; hooks are called in registration order
   *
   * @throws VisitorRegistrationError if the same instance or name is registered twice
   */
  register(visitor: SurveyVisitor, options: { name?: string } = {}): RegisteredVisitor {
    const order = this.entries.length;
    const name = options.name ?? defaultName(visitor, order);

    if (this.entries.some((entry) => entry.visitor === visitor)) {
      throw new VisitorRegistrationError(`Visitor '${name}' is already registered`, name);
    }
    if (this.entries.some((entry) => entry.name === name)) {
      throw new VisitorRegistrationError(
        `A visitor named '${name}' is already registered. Pass a distinct name.`,
        name
      );
    }

    const registered: RegisteredVisitor = Object.freeze({
      visitor,
      name,
      capabilities: detectCapabilities(visitor),
      order,
    });
    this.entries.push(registered);
    return registered;
  }

  list(): readonly RegisteredVisitor[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Build the syntax-kind dispatch table for the registered node visitors
   */
  buildNodeDispatch(): NodeDispatchMap {
    const map = new Map<ts.SyntaxKind, NodeDispatchEntry[]>();

    for (const registered of this.entries) {
      const nodeVisitors = registered.visitor.nodeVisitors;
      if (!registered.capabilities.nodeVisiting || !nodeVisitors) {continue;}

      for (const [key, visit] of Object.entries(nodeVisitors)) {
        if (typeof visit !== 'function') {continue;}
        const kind: ts.SyntaxKind = Number(key);
        const list = map.get(kind) ?? [];
        list.push({ registered, visit });
        map.set(kind, list);
      }
    }

    return map;
  }
}
