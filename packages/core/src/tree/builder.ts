/**
 * TreeBuilder
 *
 * The call sequence a template front end emits to produce a tree: push
 * fixed text, push dynamic values, open and close loop scopes. Adjacent
 * fixed pushes merge; a dynamic push without fixed text before it gets an
 * empty segment, so every built tree has `fixed.length === dynamic.length + 1`.
 *
 * @example
 * ```typescript
 * const b = new TreeBuilder<Msg>();
 * b.fixed("<ul>");
 * b.openLoop();
 * for (const item of items) {
 *   b.openEntry().fixed("<li>").text(item).fixed("</li>").closeEntry();
 * }
 * b.closeLoop().fixed("</ul>");
 * const tree = b.build();
 * ```
 *
 * @module @stitchview/core/tree
 */

import { loopOf, message, nested, text, tree, type DynamicFragment, type Tree } from "./fragment.js";

interface Frame<M> {
  fixed: string[];
  dynamic: DynamicFragment<M>[];
}

interface LoopScope<M> {
  entries: Tree<M>[];
  /** Frame of the entry currently being built */
  entry?: Frame<M>;
}

export class TreeBuilder<M> {
  private readonly root: Frame<M> = { fixed: [], dynamic: [] };
  private readonly scopes: LoopScope<M>[] = [];

  fixed(segment: string): this {
    const frame = this.frame();
    if (frame.fixed.length > frame.dynamic.length) {
      frame.fixed[frame.fixed.length - 1] += segment;
    } else {
      frame.fixed.push(segment);
    }
    return this;
  }

  text(value: string): this {
    return this.push(text(value));
  }

  message(value: M): this {
    return this.push(message(value));
  }

  nested(child: Tree<M>): this {
    return this.push(nested(child));
  }

  openLoop(): this {
    this.frame();
    this.scopes.push({ entries: [] });
    return this;
  }

  openEntry(): this {
    const scope = this.currentScope("openEntry");
    if (scope.entry) {
      throw new Error("openEntry: previous entry is still open");
    }
    scope.entry = { fixed: [], dynamic: [] };
    return this;
  }

  closeEntry(): this {
    const scope = this.currentScope("closeEntry");
    if (!scope.entry) {
      throw new Error("closeEntry: no open entry");
    }
    scope.entries.push(seal(scope.entry));
    scope.entry = undefined;
    return this;
  }

  closeLoop(): this {
    const scope = this.currentScope("closeLoop");
    if (scope.entry) {
      throw new Error("closeLoop: entry is still open");
    }
    this.scopes.pop();
    return this.push(loopOf(scope.entries));
  }

  build(): Tree<M> {
    if (this.scopes.length > 0) {
      throw new Error("build: loop scope is still open");
    }
    return seal(this.root);
  }

  private push(fragment: DynamicFragment<M>): this {
    const frame = this.frame();
    if (frame.fixed.length === frame.dynamic.length) {
      frame.fixed.push("");
    }
    frame.dynamic.push(fragment);
    return this;
  }

  /** The frame values are written to: the open entry, or the root. */
  private frame(): Frame<M> {
    const scope = this.scopes[this.scopes.length - 1];
    if (scope === undefined) return this.root;
    if (!scope.entry) {
      throw new Error("Values inside a loop must be written between openEntry and closeEntry");
    }
    return scope.entry;
  }

  private currentScope(operation: string): LoopScope<M> {
    const scope = this.scopes[this.scopes.length - 1];
    if (scope === undefined) {
      throw new Error(`${operation}: no open loop`);
    }
    return scope;
  }
}

function seal<M>(frame: Frame<M>): Tree<M> {
  const fixed = frame.fixed.length === frame.dynamic.length ? [...frame.fixed, ""] : [...frame.fixed];
  return tree(fixed, [...frame.dynamic]);
}
