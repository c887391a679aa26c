/**
 * Driver - orchestrates one survey run
 *
 * States: idle -> discovering -> (pre-root -> analyzing -> post-root)* -> finished
 *
 * Roots are processed strictly one after another; a handle is always closed
 * before the next root is opened. Hooks run in a fixed order (preAnalysis,
 * per-file hooks, postAnalysis, onRunFinished) and, at each point, in
 * visitor registration order.
 *
 * @example
 * ```typescript
 * const driver = new Driver({ config });
 * driver.register(new ErrorSurveyor({ formatter }));
 * const outcome = await driver.run();
 * ```
 */

import { EventEmitter } from 'node:events';

import { NpmInstaller, type DependencyInstaller } from '../analysis/installer.js';
import { TypeScriptEngine } from '../analysis/typescript-engine.js';
import { ContextDiscoverer } from '../discovery/context-discoverer.js';
import { qualifiedName } from '../discovery/types.js';
import { DriverStateError, VisitorHookError, toError } from '../errors.js';
import { createSilentLogger, type Logger } from '../logging/logger.js';
import { StatsAggregator } from '../stats/stats-aggregator.js';
import { syntaxKindName, traverseNodes } from '../visitors/node-traversal.js';
import { VisitorRegistry, type NodeDispatchEntry, type NodeDispatchMap } from '../visitors/visitor-registry.js';

import type ts from 'typescript';

import type { RunConfiguration } from '../config/types.js';
import type {
  AnalysisContextHandle,
  AnalysisEngine,
  FileUnitResult,
} from '../analysis/types.js';
import type { AnalysisRoot, DiscoveryResult } from '../discovery/types.js';
import type {
  PreAnalysisInfo,
  RegisteredVisitor,
  SurveyControl,
  SurveyVisitor,
} from '../visitors/types.js';
import type {
  AnalysisPass,
  DriverEvents,
  DriverState,
  RootDiscoverer,
  RunOutcome,
  RunStatus,
} from './types.js';

// ============================================================================
// Options
// ============================================================================

export interface DriverOptions {
  config: RunConfiguration;
  /** Analysis engine (default: TypeScriptEngine) */
  engine?: AnalysisEngine;
  /** Root discoverer (default: ContextDiscoverer built from config) */
  discoverer?: RootDiscoverer;
  /** Install step, skipped when config.forceSkipInstall (default: NpmInstaller) */
  installer?: DependencyInstaller;
  /** Shared statistics; pass one in to read it after a failed run */
  stats?: StatsAggregator;
  logger?: Logger;
  /** Base for relative input paths */
  cwd?: string;
}

type RootResult = 'skipped' | SurveyControl;

// ============================================================================
// Driver
// ============================================================================

/**
 * Listener methods typed by DriverEvents
 */
export interface Driver {
  on<E extends keyof DriverEvents>(event: E, listener: DriverEvents[E]): this;
  once<E extends keyof DriverEvents>(event: E, listener: DriverEvents[E]): this;
  off<E extends keyof DriverEvents>(event: E, listener: DriverEvents[E]): this;
  emit<E extends keyof DriverEvents>(event: E, ...args: Parameters<DriverEvents[E]>): boolean;
}

/**
 * Events (see DriverEvents): state, discovered, rootStarted, rootFinished,
 * rootSkipped, fileFailed, visitorDisabled
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class Driver extends EventEmitter {
  private readonly config: RunConfiguration;
  private readonly engine: AnalysisEngine;
  private readonly discoverer: RootDiscoverer;
  private readonly installer: DependencyInstaller;
  private readonly stats: StatsAggregator;
  private readonly logger: Logger;
  private readonly registry = new VisitorRegistry();

  private currentState: DriverState = 'idle';
  private active = new Set<RegisteredVisitor>();
  /** Roots that completed post-root and let the run continue; compared to maxRoots */
  private processedRoots = 0;
  /** Roots that reached preAnalysis */
  private enteredRoots = 0;

  constructor(options: DriverOptions) {
    super();
    this.config = options.config;
    this.logger = options.logger ?? createSilentLogger();
    this.engine = options.engine ?? new TypeScriptEngine({ logger: this.logger });
    this.discoverer =
      options.discoverer ??
      ContextDiscoverer.fromConfig(this.config, {
        logger: this.logger,
        ...(options.cwd !== undefined ? { cwd: options.cwd } : {}),
      });
    this.installer = options.installer ?? new NpmInstaller();
    this.stats = options.stats ?? new StatsAggregator();
  }

  get state(): DriverState {
    return this.currentState;
  }

  get visitors(): readonly RegisteredVisitor[] {
    return this.registry.list();
  }

  /**
   * Register a visitor. Only allowed before run().
   */
  register(visitor: SurveyVisitor, options: { name?: string } = {}): RegisteredVisitor {
    if (this.currentState !== 'idle') {
      throw new DriverStateError('Visitors must be registered before the run starts');
    }
    return this.registry.register(visitor, options);
  }

  /**
   * Run discovery and analyze every root
   *
   * @throws VisitorHookError when a hook fails under the 'abort' policy
   * @throws DriverStateError when called more than once
   */
  async run(): Promise<RunOutcome> {
    if (this.currentState !== 'idle') {
      throw new DriverStateError('A driver can only run once');
    }

    const visitors = this.registry.list();
    this.active = new Set(visitors);
    const dispatch = this.registry.buildNodeDispatch();
    this.stats.start();

    try {
      this.transition('discovering');
      const discovery = await this.discoverer.discover(this.config.paths);
      this.stats.recordDiscovered(discovery.total);
      this.stats.recordRootsSkipped(discovery.errors.length);
      this.emit('discovered', discovery);

      let status: RunStatus;
      if (discovery.roots.length === 0) {
        this.logger.warn('No analysis roots found');
        status = 'no-roots';
      } else {
        status = await this.processRoots(discovery, dispatch);
      }

      await this.finish(visitors);
      return { status, stats: this.stats.snapshot(), discovery };
    } catch (error) {
      this.currentState = 'finished';
      this.stats.finish();
      throw error;
    }
  }

  // ==========================================================================
  // Root Loop
  // ==========================================================================

  private async processRoots(discovery: DiscoveryResult, dispatch: NodeDispatchMap): Promise<RunStatus> {
    const { roots, total } = discovery;
    const limit = this.config.maxRoots;

    if (limit !== null) {
      this.logger.info(`Limiting analysis to ${limit} root(s).`);
    }

    for (let i = 0; i < roots.length; i++) {
      const root = roots[i];
      if (root === undefined) {continue;}

      this.transition('pre-root');
      if (limit !== null && this.processedRoots >= limit) {
        this.logger.info(`Reached the limit of ${limit} root(s)`);
        this.stats.recordRootsSkipped(roots.length - i);
        return 'limit-reached';
      }

      const result = await this.processRoot(root, total, dispatch);
      if (result === 'stop') {
        this.stats.recordRootsSkipped(roots.length - i - 1);
        return 'stopped';
      }
      if (result === 'continue') {
        this.processedRoots++;
      }
    }

    return 'completed';
  }

  private async processRoot(root: AnalysisRoot, total: number, dispatch: NodeDispatchMap): Promise<RootResult> {
    const name = qualifiedName(root);

    if (!this.config.forceSkipInstall) {
      await this.installDependencies(root);
    }

    let handle: AnalysisContextHandle;
    try {
      handle = await this.engine.open(root, this.config);
    } catch (error) {
      const cause = toError(error);
      this.logger.error(`Skipping '${name}': ${cause.message}`);
      this.stats.recordRootsSkipped();
      this.emit('rootSkipped', root, cause);
      return 'skipped';
    }

    const pass: AnalysisPass = { root, handle, fileIndex: 0, filesAnalyzed: 0, fileFailures: 0 };

    try {
      this.enteredRoots++;
      const info: PreAnalysisInfo = {
        isSubRoot: root.isSubRoot,
        index: root.index,
        position: this.enteredRoots,
        total,
      };
      this.logger.debug(`Analyzing '${name}' [${info.position}/${total}]`);
      this.emit('rootStarted', root, info);

      for (const registered of this.withCapability('preAnalysis')) {
        await this.invoke(registered, 'preAnalysis', () => registered.visitor.preAnalysis?.(root, info));
      }

      this.transition('analyzing');
      await this.analyzeFiles(pass, dispatch);

      this.transition('post-root');
      const control = await this.postAnalysis(root);
      this.stats.recordRootProcessed();
      this.emit('rootFinished', root, pass);
      return control;
    } finally {
      await this.closeHandle(handle);
    }
  }

  private async analyzeFiles(pass: AnalysisPass, dispatch: NodeDispatchMap): Promise<void> {
    for await (const result of this.engine.iterateFiles(pass.handle)) {
      pass.fileIndex++;

      if (result.kind === 'failure') {
        pass.fileFailures++;
        this.stats.recordFileFailure();
        this.logger.warn(`Skipping ${result.relativePath}: ${result.error.message}`);
        this.emit('fileFailed', pass.root, result);
        continue;
      }

      pass.filesAnalyzed++;
      this.stats.recordFileAnalyzed();
      await this.visitFile(pass.root, result, dispatch);
    }
  }

  private async visitFile(root: AnalysisRoot, file: FileUnitResult, dispatch: NodeDispatchMap): Promise<void> {
    for (const registered of this.withCapability('fileContext')) {
      await this.invoke(registered, 'setFileContext', () =>
        registered.visitor.setFileContext?.(file.path, file.lineInfo)
      );
    }

    if (dispatch.size > 0) {
      const context = { root, file };
      const matches: Array<{ entry: NodeDispatchEntry; node: ts.Node }> = [];
      traverseNodes(file.unit.sourceFile, dispatch, (entry, node) => {
        matches.push({ entry, node });
      });

      for (const { entry, node } of matches) {
        await this.invoke(entry.registered, `nodeVisitors[${syntaxKindName(node.kind)}]`, () =>
          entry.visit(node, context)
        );
      }
    }

    if (this.config.showErrors) {
      for (const registered of this.withCapability('errorReporting')) {
        await this.invoke(registered, 'reportErrors', () => registered.visitor.reportErrors?.(file));
      }
    }
  }

  private async postAnalysis(root: AnalysisRoot): Promise<SurveyControl> {
    let control: SurveyControl = 'continue';

    for (const registered of this.withCapability('postAnalysis')) {
      const decision = await this.invoke(registered, 'postAnalysis', () =>
        registered.visitor.postAnalysis?.(root)
      );
      if (decision === 'stop') {
        this.logger.info(`'${registered.name}' requested to stop after '${qualifiedName(root)}'`);
        control = 'stop';
      }
    }

    return control;
  }

  private async finish(visitors: readonly RegisteredVisitor[]): Promise<void> {
    this.transition('finished');
    this.stats.finish();

    for (const registered of visitors) {
      if (!registered.capabilities.runFinished) {continue;}
      await this.invoke(registered, 'onRunFinished', () =>
        registered.visitor.onRunFinished?.(this.stats.snapshot())
      );
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private transition(next: DriverState): void {
    if (this.currentState === next) {return;}
    this.currentState = next;
    this.emit('state', next);
  }

  /**
   * Active visitors implementing a hook, in registration order
   */
  private withCapability(capability: keyof RegisteredVisitor['capabilities']): RegisteredVisitor[] {
    return this.registry
      .list()
      .filter((registered) => registered.capabilities[capability] && this.active.has(registered));
  }

  private async invoke<T>(
    registered: RegisteredVisitor,
    hook: string,
    call: () => T | Promise<T>
  ): Promise<T | undefined> {
    if (!this.active.has(registered)) {
      return undefined;
    }
    try {
      return await call();
    } catch (error) {
      this.handleHookFailure(registered, hook, error);
      return undefined;
    }
  }

  /**
   * Abort the run, or disable the visitor under the 'isolate' policy
   */
  private handleHookFailure(registered: RegisteredVisitor, hook: string, error: unknown): void {
    const hookError = new VisitorHookError(registered.name, hook, toError(error));
    if (this.config.visitorErrorPolicy !== 'isolate') {
      throw hookError;
    }
    this.logger.error(`${hookError.message} (visitor disabled)`);
    this.active.delete(registered);
    this.emit('visitorDisabled', registered, hookError);
  }

  private async installDependencies(root: AnalysisRoot): Promise<void> {
    try {
      const outcome = await this.installer.install(root);
      if (outcome === 'installed') {
        this.logger.info(`Installed dependencies for '${qualifiedName(root)}'`);
      }
    } catch (error) {
      this.logger.warn(`Dependency install failed for '${qualifiedName(root)}': ${toError(error).message}`);
    }
  }

  private async closeHandle(handle: AnalysisContextHandle): Promise<void> {
    try {
      await this.engine.close(handle);
    } catch (error) {
      this.logger.warn(`Failed to close '${qualifiedName(handle.root)}': ${toError(error).message}`);
    }
  }
}
