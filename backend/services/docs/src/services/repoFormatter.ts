// backend/services/docs/src/services/repoFormatter.ts
import type {
  NodeStatus,
  NodeType,
  RepoNode,
  RepoRecord,
} from "../contracts/docs";

export interface TreeNode {
  id: string;
  name: string;
  path: string;
  type: NodeType;
  status: NodeStatus;
  githubUrl: string;
  children: TreeNode[];
}

export interface FormattedRepo {
  id: string;
  name: string;
  ownerId: string;
  status: NodeStatus;
  tree: TreeNode[];
}

function toTreeNode(node: RepoNode): TreeNode {
  const segments = node.relativePath.split("/");
  return {
    id: node.id,
    name: segments[segments.length - 1],
    path: node.relativePath,
    type: node.type,
    status: node.status,
    githubUrl: node.githubUrl,
    children: [],
  };
}

/**
 * Nest the flat child -> parent map into a tree, breadth-first from the
 * root doc. The root itself is not emitted; its children form `tree`.
 */
export function formatRepo(repo: RepoRecord): FormattedRepo {
  const formatted: FormattedRepo = {
    id: repo.id,
    name: repo.repoName,
    ownerId: repo.owner,
    status: repo.status,
    tree: [],
  };
  if (!repo.rootDoc) return formatted;

  const nodes = new Map<string, TreeNode>();
  const childrenOf = (parentId: string): TreeNode[] => {
    if (parentId === repo.rootDoc) return formatted.tree;
    return nodes.get(parentId)?.children ?? [];
  };

  const used = new Set<string>();
  const queue: string[] = [repo.rootDoc];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const [childId, parentId] of Object.entries(repo.dependencies)) {
      if (parentId !== current || used.has(childId)) continue;
      used.add(childId);
      const child = repo.docs[childId];
      if (!child) continue;
      const node = toTreeNode(child);
      nodes.set(childId, node);
      childrenOf(current).push(node);
      queue.push(childId);
    }
  }

  return formatted;
}
