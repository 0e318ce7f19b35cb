/**
 * Macro expansion engine
 *
 * Inside templates expansion is textual: a body is parsed in preprocess
 * mode and its nodes are turned back into text with every call and
 * argument replaced by its expansion. At page level, `expandTree` parses
 * the text of each call in document mode and splices the nodes into the
 * tree in place of the call.
 *
 * Text that must not be read as markup again (nowiki content, frozen and
 * missing calls) is swapped for a marker that indexes the expander's
 * literal table; the page-level parse turns markers back into literal text
 * nodes.
 *
 * @module expand/engine
 */

import { ExpansionContext, DEFAULT_LIMITS, type CallKind, type ExpansionLimits } from './context.js';
import { TemplateFrame, type NodeExpander } from './frame.js';
import {
  errorMarker,
  magicWord,
  parserFunction,
  textArg,
  type FunctionArg,
  type FunctionHost,
  type ParserFunction,
} from './parser-functions.js';
import { transclusionText } from './preprocess.js';
import type { DiagnosticInput, DiagnosticKind, DiagnosticSink } from '../lib/diagnostics.js';
import { LRUCache } from '../lib/lru-cache.js';
import { NS_MAIN, NS_TEMPLATE } from '../lib/constants.js';
import { LuaError, type FrameHost, type PageHost, type Sandbox } from '../lua/index.js';
import { normalizeTitle, splitTitle } from '../store/names.js';
import type { Resolver } from '../store/resolver.js';
import {
  LITERAL_CLOSE,
  LITERAL_OPEN,
  RAW_TAGS,
  mapNodes,
  parse,
  toWikitext,
  walk,
  type ArgumentNode,
  type Leniency,
  type RootNode,
  type TemplateNode,
  type TemplateParam,
  type WikiNode,
} from '../wikitext/index.js';

const MARKER = new RegExp(`${LITERAL_OPEN}(\\d+)${LITERAL_CLOSE}`, 'g');
const PREFIXES = /^\s*(?:safesubst|subst|msg)\s*:/i;

/** Parsed template bodies shared by the expanders of one lane */
export type BodyCache = LRUCache<string, readonly WikiNode[]>;

export interface ExpanderOptions {
  /** Title of the page being expanded */
  title: string;
  resolver: Resolver;
  sandbox: Sandbox;
  diagnostics: DiagnosticSink;
  limits?: ExpansionLimits | undefined;
  signal?: AbortSignal | undefined;
  leniency?: Leniency | undefined;
  maxNesting?: number | undefined;
  bodies?: BodyCache | undefined;
}

interface Expansion {
  text: string;
  /** Template, module or function the call ran */
  name: string;
}

function textNode(value: string): WikiNode {
  return { kind: 'text', value, start: 0, end: 0 };
}

function hasCalls(nodes: readonly WikiNode[]): boolean {
  let found = false;
  walk(nodes, node => {
    if (node.kind === 'template' || node.kind === 'argument') found = true;
    return !found;
  });
  return found;
}

/**
 * Expands the calls of one page
 *
 * An expander is single-use: it owns the page's call stack, expansion
 * budget and literal table.
 *
 * @example
 * ```typescript
 * const expander = new Expander({ title: 'sortaa', resolver, sandbox, diagnostics });
 * const expanded = expander.expandTree(parse(text).root);
 * ```
 */
export class Expander {
  readonly title: string;
  private readonly ctx: ExpansionContext;
  private readonly literals: string[] = [];
  private readonly bodies: BodyCache;
  private readonly pageFrame: TemplateFrame;
  private readonly hosts = new WeakMap<TemplateFrame, FrameHost>();
  private readonly expandNodesIn: NodeExpander;
  private readonly functionHost: FunctionHost;
  private readonly pageHost: PageHost;
  /** Offset of the page-level call being expanded */
  private offset: number | undefined;

  constructor(private readonly options: ExpanderOptions) {
    this.title = options.title;
    this.ctx = new ExpansionContext(options.limits ?? DEFAULT_LIMITS, options.signal);
    this.bodies = options.bodies ?? new LRUCache({ maxSize: 512 });
    this.expandNodesIn = (nodes, frame) => this.expandNodes(nodes, frame);
    this.pageFrame = new TemplateFrame(options.title, null, this.expandNodesIn);
    this.functionHost = {
      title: options.title,
      pageExists: title => options.resolver.pageExists(title),
      literal: text => this.literal(text),
    };
    this.pageHost = {
      title: options.title,
      unstrip: text => this.unstrip(text),
      killMarkers: text => text.replace(MARKER, ''),
    };
  }

  /** Template and module calls made so far */
  get expansionCount(): number {
    return this.ctx.expansionCount;
  }

  // ==========================================================================
  // Page level
  // ==========================================================================

  /**
   * Replace every call and argument in the tree with the nodes of its
   * expansion, each tagged with the name of the call that produced it
   *
   * A tree without calls is returned as is.
   */
  expandTree(root: RootNode): RootNode {
    if (!hasCalls(root.children)) return root;
    const children = mapNodes(root.children, node => {
      if (node.kind !== 'template' && node.kind !== 'argument') return undefined;
      this.offset = node.start;
      const expansion =
        node.kind === 'template'
          ? this.expandCall(node, this.pageFrame)
          : { text: this.expandArgument(node, this.pageFrame), name: toWikitext(node.name).trim() };
      this.offset = undefined;
      return this.spliced(expansion, node.start, node.end);
    });
    return { kind: 'root', children };
  }

  /**
   * Expand wikitext as if it were the body of `frame` and return text
   * that may hold literal markers
   */
  expandText(text: string, frame: TemplateFrame = this.pageFrame): string {
    this.ctx.checkAbort();
    const nodes = parse(text, {
      mode: 'preprocess',
      literals: this.literals,
      maxNesting: this.options.maxNesting,
    }).root.children;
    return this.expandNodes(nodes, frame);
  }

  /** Expand wikitext to plain markup, literal markers resolved */
  render(text: string): string {
    return this.unstrip(this.expandText(text));
  }

  /** Replace markers with the text they protect */
  unstrip(text: string): string {
    return text.replace(MARKER, (marker, index: string) => this.literals[Number(index)] ?? marker);
  }

  private spliced(expansion: Expansion, start: number, end: number): WikiNode[] {
    const parsed = parse(expansion.text, {
      literals: this.literals,
      leniency: this.options.leniency,
      maxNesting: this.options.maxNesting,
    }).root.children;
    // Calls left in the output of a call are never expanded again
    const frozen = mapNodes(parsed, node =>
      node.kind === 'template' || node.kind === 'argument'
        ? [{ kind: 'text', value: toWikitext(node), literal: true, start: node.start, end: node.end }]
        : undefined
    );
    walk(frozen, node => {
      node.origin = expansion.name;
      node.start = start;
      node.end = end;
    });
    return frozen;
  }

  // ==========================================================================
  // Textual expansion
  // ==========================================================================

  private literal(text: string): string {
    this.literals.push(this.unstrip(text));
    return `${LITERAL_OPEN}${this.literals.length - 1}${LITERAL_CLOSE}`;
  }

  private expandNodes(nodes: readonly WikiNode[], frame: TemplateFrame): string {
    const substituted = mapNodes(nodes, node => {
      switch (node.kind) {
        case 'template':
          return [textNode(this.expandCall(node, frame).text)];
        case 'argument':
          return [textNode(this.expandArgument(node, frame))];
        case 'comment':
          return [];
        case 'text':
          return node.literal ? [textNode(this.literal(node.value))] : [node];
        case 'html':
          if (node.tag === 'nowiki') {
            if (node.selfClosing) return [];
            return [textNode(this.literal(node.children.map(child => (child.kind === 'text' ? child.value : toWikitext(child))).join('')))];
          }
          return RAW_TAGS.has(node.tag) ? [node] : undefined;
        default:
          return undefined;
      }
    });
    return toWikitext(substituted);
  }

  private expandArgument(node: ArgumentNode, frame: TemplateFrame): string {
    const name = this.expandNodes(node.name, frame).trim();
    const value = frame.getArg(name) ?? frame.defaultFor(name);
    if (value !== undefined) return value;
    if (node.fallback) return this.expandNodes(node.fallback, frame);
    return this.literal(`{{{${name}}}}`);
  }

  private expandCall(node: TemplateNode, frame: TemplateFrame): Expansion {
    this.ctx.checkAbort();
    let name = this.expandNodes(node.name, frame);
    while (PREFIXES.test(name)) name = name.replace(PREFIXES, '');
    name = name.trim();
    const colon = name.indexOf(':');

    if (node.params.length === 0) {
      const head = colon === -1 ? name : name.slice(0, colon);
      const value = magicWord(head, colon === -1 ? undefined : name.slice(colon + 1), this.title);
      if (value !== undefined) return { text: value, name: head.trim() };
    }

    if (colon > 0) {
      const head = name.slice(0, colon).trim().toLowerCase();
      const first = name.slice(colon + 1).trim();
      if (head === '#invoke') return this.invokeNode(node, first, frame);
      const fn = parserFunction(head);
      if (fn) {
        const args = node.params.map(param => this.paramArg(param, frame));
        return { text: this.callFunction(head, fn, first, args), name: head };
      }
    }

    return this.transclude(
      name,
      (title, defaults) => TemplateFrame.fromParams(title, frame, node.params, this.expandNodesIn, defaults),
      () => toWikitext(node)
    );
  }

  private callFunction(name: string, fn: ParserFunction, first: string, args: readonly FunctionArg[]): string {
    return fn({ name, first, args, host: this.functionHost });
  }

  /** A call's param as a lazily expanded function argument */
  private paramArg(param: TemplateParam, frame: TemplateFrame): FunctionArg {
    let name: string | null | undefined;
    let value: string | undefined;
    const getName = (): string | null => {
      if (name === undefined) name = param.name ? this.expandNodes(param.name, frame).trim() : null;
      return name;
    };
    const getValue = (): string => {
      if (value === undefined) value = this.expandNodes(param.value, frame).trim();
      return value;
    };
    return {
      name: getName,
      value: getValue,
      text: () => {
        const key = getName();
        return key === null ? getValue() : `${key}=${getValue()}`;
      },
    };
  }

  // ==========================================================================
  // Templates and pages
  // ==========================================================================

  /**
   * Expand a template, or a page of another namespace
   *
   * `bind` builds the callee's frame once the declared defaults are known;
   * `source` is the call as written, kept literally when the call cannot run.
   */
  private transclude(
    name: string,
    bind: (title: string, defaults: Readonly<Record<string, string>>) => TemplateFrame,
    source: () => string
  ): Expansion {
    const target = this.target(name);
    if (!target) {
      const normalized = this.options.resolver.normalize(name, 'template');
      this.report({ kind: 'resolution-miss', message: `template not found: ${normalized}` });
      return { text: this.literal(source()), name: normalized };
    }
    const child = bind(target.title, target.defaults);
    return {
      text: this.run('template', target.name, child.signature(target.name), source, () =>
        this.expandNodes(this.body(target.title, target.body), child)
      ),
      name: target.name,
    };
  }

  private target(
    name: string
  ): { name: string; title: string; body: string; defaults: Readonly<Record<string, string>> } | undefined {
    const trimmed = name.trim();
    const explicitPage = trimmed.startsWith(':');
    const { namespace } = splitTitle(trimmed);
    if (explicitPage || (namespace !== NS_MAIN && namespace !== NS_TEMPLATE)) {
      const title = normalizeTitle(trimmed);
      const page = this.options.resolver.getPage(title);
      return page ? { name: title, title, body: page.text, defaults: {} } : undefined;
    }
    const resolution = this.options.resolver.resolveTemplate(trimmed);
    if (!resolution.found) return undefined;
    const { definition } = resolution;
    return {
      name: definition.name,
      title: `Template:${definition.name}`,
      body: definition.body,
      defaults: definition.defaults,
    };
  }

  private body(title: string, body: string): readonly WikiNode[] {
    return this.bodies.getOrCompute(title, () =>
      parse(transclusionText(body), { mode: 'preprocess', maxNesting: this.options.maxNesting }).root.children
    );
  }

  /**
   * Run a call inside the expansion context; a refused call is reported
   * and kept as literal text
   */
  private run(kind: CallKind, name: string, signature: string, source: () => string, body: () => string): string {
    const entered = this.ctx.enter({ kind, name, signature });
    if (!entered.ok) {
      this.report({ kind: entered.kind, message: entered.message });
      return this.literal(source());
    }
    return this.ctx.within(body);
  }

  // ==========================================================================
  // Modules
  // ==========================================================================

  private invokeNode(node: TemplateNode, moduleName: string, frame: TemplateFrame): Expansion {
    const [fnParam, ...rest] = node.params;
    const fnName = fnParam ? this.paramArg(fnParam, frame).text() : '';
    return this.invoke(moduleName, fnName, frame, () => toWikitext(node), title =>
      TemplateFrame.fromParams(title, frame, rest, this.expandNodesIn)
    );
  }

  private invoke(
    moduleName: string,
    functionName: string,
    parent: TemplateFrame,
    source: () => string,
    bind: (title: string) => TemplateFrame
  ): Expansion {
    const resolution = this.options.resolver.resolveModule(moduleName);
    if (!resolution.found) {
      this.report({ kind: 'resolution-miss', message: `module not found: ${resolution.name}` });
      return { text: this.literal(source()), name: resolution.name };
    }
    const name = resolution.definition.name;
    if (functionName === '') {
      this.report({ kind: 'sandbox-fault', message: `no function specified for module ${name}` });
      return { text: errorMarker('Script error: you must specify a function to call.'), name };
    }
    const frame = bind(`Module:${name}`);
    const signature = `${frame.signature(`${name}|${functionName}`)}\u0001${parent.signature(parent.title)}`;
    const text = this.run('module', name, signature, source, () => {
      const result = this.options.sandbox.invoke(name, functionName, this.host(frame));
      if (result.ok) return result.text;
      const kind: DiagnosticKind = result.error.kind === 'timeout' ? 'sandbox-timeout' : 'sandbox-fault';
      this.report({ kind, message: `${name}.${functionName}: ${result.error.message}` });
      return errorMarker(`Lua error: ${result.error.message}`);
    });
    return { text, name };
  }

  /** The view of a frame that module code gets */
  private host(frame: TemplateFrame): FrameHost {
    const cached = this.hosts.get(frame);
    if (cached) return cached;
    const parentFrame = frame.parent;
    const host: FrameHost = {
      title: frame.title,
      parent: parentFrame ? this.host(parentFrame) : null,
      page: this.pageHost,
      getArg: name => frame.getArg(name),
      argNames: () => frame.argNames(),
      expandTemplate: (title, args) =>
        this.transclude(
          title,
          (childTitle, defaults) => TemplateFrame.fromText(childTitle, frame, args, this.expandNodesIn, defaults),
          () => {
            const parts = [...args].map(([key, value]) => (/^[1-9]\d*$/.test(key) ? value : `${key}=${value}`));
            return `{{${[title, ...parts].join('|')}}}`;
          }
        ).text,
      preprocess: text => this.expandText(text, frame),
      callParserFunction: (name, args) => this.callFromModule(name, args, frame),
      newChild: (title, args) => this.host(TemplateFrame.fromText(title, frame, args, this.expandNodesIn)),
    };
    this.hosts.set(frame, host);
    return host;
  }

  /**
   * `frame:callParserFunction` from module code; the name may carry the
   * first argument after a colon
   */
  private callFromModule(name: string, args: readonly string[], frame: TemplateFrame): string {
    const colon = name.indexOf(':');
    const head = (colon === -1 ? name : name.slice(0, colon)).trim();
    const values = colon === -1 ? args : [name.slice(colon + 1), ...args];
    const [first = '', ...rest] = values;

    const magic = rest.length === 0 ? magicWord(head, colon === -1 && first === '' ? undefined : first, this.title) : undefined;
    if (magic !== undefined) return magic;

    if (head.toLowerCase() === '#invoke') {
      const [functionName = '', ...callArgs] = rest;
      const source = () => `{{#invoke:${[first, ...rest].join('|')}}}`;
      return this.invoke(first.trim(), functionName.trim(), frame, source, title => {
        const bound = new Map<string, string>();
        let position = 0;
        for (const arg of callArgs.map(textArg)) {
          const key = arg.name();
          if (key === null) bound.set(String(++position), arg.value());
          else bound.set(key, arg.value());
        }
        return TemplateFrame.fromText(title, frame, bound, this.expandNodesIn);
      }).text;
    }

    const fn = parserFunction(head);
    if (!fn) throw new LuaError(`frame:callParserFunction: function "${head}" was not found`);
    return this.callFunction(head.toLowerCase(), fn, first.trim(), rest.map(textArg));
  }

  // ==========================================================================
  // Diagnostics
  // ==========================================================================

  private report(input: DiagnosticInput): void {
    this.options.diagnostics.report({ offset: this.offset, stack: this.ctx.names(), ...input });
  }
}
