import type { SessionHierarchy, TreePath } from "../types/model.js";

export interface TreeNode<T> {
  id: string;
  children: readonly T[];
}

export interface VisibleNode<T> {
  path: TreePath;
  depth: number;
  node: T;
}

const pathKey = (path: TreePath): string => JSON.stringify(path);

export const samePath = (left: TreePath, right: TreePath): boolean =>
  left.length === right.length && left.every((segment, index) => segment === right[index]);

export const findNode = <T extends TreeNode<T>>(
  nodes: readonly T[],
  path: TreePath
): T | undefined => {
  let level = nodes;
  let found: T | undefined;
  for (const segment of path) {
    found = level.find((candidate) => candidate.id === segment);
    if (!found) {
      return undefined;
    }
    level = found.children;
  }
  return found;
};

/** Depth-first listing of the nodes reachable through opened parents. */
export const flattenVisible = <T extends TreeNode<T>>(
  nodes: readonly T[],
  isOpen: (path: TreePath) => boolean,
  parent: TreePath = []
): VisibleNode<T>[] => {
  const visible: VisibleNode<T>[] = [];
  for (const node of nodes) {
    const path = [...parent, node.id];
    visible.push({ path, depth: parent.length, node });
    if (node.children.length > 0 && isOpen(path)) {
      visible.push(...flattenVisible(node.children, isOpen, path));
    }
  }
  return visible;
};

/**
 * Cursor over the session tree, addressed by identifier paths rather than
 * node references so it survives a wholesale rebuild of the hierarchy.
 * Paths are resolved lazily; one that no longer exists simply fails to
 * resolve.
 */
export class TreeState {
  private selected: TreePath = [];
  private readonly opened = new Map<string, TreePath>();

  public currentSelection(): TreePath {
    return this.selected;
  }

  public openedPaths(): TreePath[] {
    return Array.from(this.opened.values());
  }

  public isOpen(path: TreePath): boolean {
    return this.opened.has(pathKey(path));
  }

  public open(path: TreePath): boolean {
    const key = pathKey(path);
    if (path.length === 0 || this.opened.has(key)) {
      return false;
    }
    this.opened.set(key, [...path]);
    return true;
  }

  public close(path: TreePath): boolean {
    return this.opened.delete(pathKey(path));
  }

  public select(path: TreePath): boolean {
    if (samePath(this.selected, path)) {
      return false;
    }
    this.selected = [...path];
    return true;
  }

  public moveDown<T extends TreeNode<T>>(nodes: readonly T[]): boolean {
    return this.selectRelative(nodes, (current) => (current === undefined ? 0 : current + 1));
  }

  public moveUp<T extends TreeNode<T>>(nodes: readonly T[]): boolean {
    return this.selectRelative(nodes, (current) =>
      current === undefined ? Number.MAX_SAFE_INTEGER : Math.max(0, current - 1)
    );
  }

  public selectFirst<T extends TreeNode<T>>(nodes: readonly T[]): boolean {
    return this.selectRelative(nodes, () => 0);
  }

  public selectLast<T extends TreeNode<T>>(nodes: readonly T[]): boolean {
    return this.selectRelative(nodes, () => Number.MAX_SAFE_INTEGER);
  }

  /** Opens the selected node when it has children to show. */
  public expand<T extends TreeNode<T>>(nodes: readonly T[]): boolean {
    const node = findNode(nodes, this.selected);
    if (!node || node.children.length === 0) {
      return false;
    }
    return this.open(this.selected);
  }

  /** Closes the selected node, or moves to its parent when it is not open. */
  public collapse(): boolean {
    if (this.close(this.selected)) {
      return true;
    }
    if (this.selected.length === 0) {
      return false;
    }
    this.selected = this.selected.slice(0, -1);
    return true;
  }

  public openAndSelect(sessions: SessionHierarchy, sessionName: string): boolean {
    const session = sessions.find((candidate) => candidate.name === sessionName);
    if (!session) {
      return false;
    }

    const opened = this.open([session.name]);
    const [firstWindow] = session.windowStates;
    const selected = firstWindow
      ? this.select([session.name, String(firstWindow.index)])
      : this.select([session.name]);
    return opened || selected;
  }

  /** Selects the `position`-th window (1-based, in index order) of a session. */
  public selectWindow(sessions: SessionHierarchy, sessionName: string, position: number): boolean {
    const session = sessions.find((candidate) => candidate.name === sessionName);
    if (!session || position < 1) {
      return false;
    }
    const window = session.windowStates[position - 1];
    if (!window) {
      return false;
    }

    const opened = this.open([session.name]);
    const selected = this.select([session.name, String(window.index)]);
    return opened || selected;
  }

  private selectRelative<T extends TreeNode<T>>(
    nodes: readonly T[],
    next: (current: number | undefined) => number
  ): boolean {
    const visible = flattenVisible(nodes, (path) => this.isOpen(path));
    if (visible.length === 0) {
      return this.select([]);
    }

    const found = visible.findIndex((entry) => samePath(entry.path, this.selected));
    const index = Math.min(next(found === -1 ? undefined : found), visible.length - 1);
    return this.select(visible[index].path);
  }
}
