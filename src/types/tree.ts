/**
 * ノードに付与される進化イベント
 * タグが無い場合は 'none' として扱う。
 */
export const TREE_EVENTS = ['duplication', 'loss', 'speciation', 'none'] as const;

export type TreeEvent = (typeof TREE_EVENTS)[number];

/**
 * イベント木のノード
 *
 * NHX の読み書きで往復が保証されるのは name と event のみ。
 * annotations には event 以外のタグ（segment など）が読み込まれるが、書き出しはされない。
 */
export interface EventTree {
  name: string;
  event: TreeEvent;
  annotations: Record<string, string>;
  children: EventTree[];
}

export function isTreeEvent(value: string): value is TreeEvent {
  return TREE_EVENTS.some((event) => event === value);
}

/** テスト・組み立て用の簡易コンストラクタ */
export function createNode(
  name: string,
  event: TreeEvent = 'none',
  children: EventTree[] = [],
): EventTree {
  return { name, event, annotations: {}, children };
}
