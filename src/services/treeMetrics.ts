import type { EventTree } from '../types/tree';

/**
 * 木の DL スコア（duplication / loss イベントを持つノードの数）
 */
export function computeDLScore(tree: EventTree): number {
  const own = tree.event === 'duplication' || tree.event === 'loss' ? 1 : 0;
  return tree.children.reduce((total, child) => total + computeDLScore(child), own);
}

interface PostorderIndex {
  /** 1 始まりの後行順ノード列。0 番目は未使用 */
  nodes: EventTree[];
  /** 各ノードの最左葉の後行順番号 */
  leftmost: number[];
  keyroots: number[];
}

function indexPostorder(tree: EventTree): PostorderIndex {
  const nodes: EventTree[] = [tree];
  const leftmost: number[] = [0];

  const visit = (node: EventTree): number => {
    let first = -1;
    for (const child of node.children) {
      const childLeftmost = visit(child);
      if (first === -1) first = childLeftmost;
    }
    nodes.push(node);
    const index = nodes.length - 1;
    leftmost.push(first === -1 ? index : first);
    return leftmost[index];
  };
  visit(tree);

  // 同じ最左葉を持つノードのうち最も後ろのものが keyroot
  const lastByLeftmost = new Map<number, number>();
  for (let i = 1; i < nodes.length; i++) {
    lastByLeftmost.set(leftmost[i], i);
  }
  const keyroots = [...lastByLeftmost.values()].sort((a, b) => a - b);

  return { nodes, leftmost, keyroots };
}

/**
 * 順序付き木の編集距離（Zhang–Shasha）
 * 挿入・削除のコストは 1、ラベル置換は name が異なるとき 1。
 */
export function computeEditDistance(before: EventTree, after: EventTree): number {
  const a = indexPostorder(before);
  const b = indexPostorder(after);
  const sizeA = a.nodes.length - 1;
  const sizeB = b.nodes.length - 1;

  const treeDistance = Array.from({ length: sizeA + 1 }, () => new Array<number>(sizeB + 1).fill(0));

  for (const i of a.keyroots) {
    for (const j of b.keyroots) {
      const li = a.leftmost[i];
      const lj = b.leftmost[j];
      const rows = i - li + 2;
      const cols = j - lj + 2;
      const forest = Array.from({ length: rows }, () => new Array<number>(cols).fill(0));

      for (let x = 1; x < rows; x++) forest[x][0] = forest[x - 1][0] + 1;
      for (let y = 1; y < cols; y++) forest[0][y] = forest[0][y - 1] + 1;

      for (let x = 1; x < rows; x++) {
        for (let y = 1; y < cols; y++) {
          const nodeA = x + li - 1;
          const nodeB = y + lj - 1;
          const remove = forest[x - 1][y] + 1;
          const insert = forest[x][y - 1] + 1;

          if (a.leftmost[nodeA] === li && b.leftmost[nodeB] === lj) {
            const relabel = a.nodes[nodeA].name === b.nodes[nodeB].name ? 0 : 1;
            forest[x][y] = Math.min(remove, insert, forest[x - 1][y - 1] + relabel);
            treeDistance[nodeA][nodeB] = forest[x][y];
          } else {
            const p = a.leftmost[nodeA] - li;
            const q = b.leftmost[nodeB] - lj;
            forest[x][y] = Math.min(remove, insert, forest[p][q] + treeDistance[nodeA][nodeB]);
          }
        }
      }
    }
  }

  return treeDistance[sizeA][sizeB];
}
