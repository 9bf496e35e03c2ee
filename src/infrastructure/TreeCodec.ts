import { ParseError } from '../errors';
import { isTreeEvent, type EventTree } from '../types/tree';

// 引用符なし識別子に使えない文字
const RESERVED_CHARS = '()[],:;= \t\r\n';
const NEEDS_QUOTING = /[()[\],:;="\s]/;
const NHX_START = '[&&NHX';
const EVENT_KEY = 'event';
const NUMBER_PATTERN = /[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?/y;

/**
 * NHX 形式の再帰下降パーサ
 *
 * tree     := subtree ';'
 * subtree  := ['(' subtree (',' subtree)* ')'] node
 * node     := [ident] [':' number] ['[&&NHX' (':' ident '=' ident)* ']']
 *
 * トークン間の空白と、&&NHX で始まらない [...] コメントは読み飛ばす。
 */
class NhxParser {
  private position = 0;

  constructor(private readonly text: string) {}

  parse(): EventTree {
    const tree = this.parseSubtree();
    this.expect(';');
    this.skipIgnored();

    if (this.position < this.text.length) {
      throw this.error(`expected <end> but found "${this.text.slice(this.position)}"`);
    }
    return tree;
  }

  private parseSubtree(): EventTree {
    this.skipIgnored();
    const children: EventTree[] = [];

    if (this.peek() === '(') {
      this.position++;
      children.push(this.parseSubtree());
      this.skipIgnored();

      while (this.peek() === ',') {
        this.position++;
        children.push(this.parseSubtree());
        this.skipIgnored();
      }
      this.expect(')');
    }

    const node = this.parseNode();
    node.children = children;
    return node;
  }

  private parseNode(): EventTree {
    this.skipIgnored();
    const ch = this.peek();
    const name = ch !== '' && (ch === '"' || !RESERVED_CHARS.includes(ch)) ? this.parseIdent() : '';

    this.skipIgnored();
    if (this.peek() === ':') {
      // 枝長は読み捨てる
      this.position++;
      this.skipIgnored();
      this.parseNumber();
      this.skipIgnored();
    }

    const tagsOffset = this.position;
    const annotations = this.text.startsWith(NHX_START, this.position) ? this.parseTags() : {};
    const { [EVENT_KEY]: event = 'none', ...rest } = annotations;

    if (!isTreeEvent(event)) {
      throw new ParseError(`unknown event "${event}"`, tagsOffset);
    }
    return { name, event, annotations: rest, children: [] };
  }

  private parseTags(): Record<string, string> {
    this.position += NHX_START.length;
    const tags: Record<string, string> = {};

    for (;;) {
      this.skipIgnored();
      const ch = this.peek();

      if (ch === ']') {
        this.position++;
        return tags;
      }
      if (ch !== ':') {
        throw this.error(`expected ':' or ']' but found ${this.describe()}`);
      }

      this.position++;
      this.skipIgnored();
      const keyOffset = this.position;
      const key = this.parseIdent();
      if (Object.hasOwn(tags, key)) {
        throw new ParseError(`duplicate tag "${key}"`, keyOffset);
      }
      this.expect('=');
      this.skipIgnored();
      tags[key] = this.parseIdent();
    }
  }

  private parseIdent(): string {
    if (this.peek() === '"') {
      this.position++;
      let value = '';

      for (;;) {
        const ch = this.peek();
        if (ch === '') {
          throw this.error('unterminated quoted identifier');
        }
        this.position++;

        if (ch !== '"') {
          value += ch;
        } else if (this.peek() === '"') {
          value += '"';
          this.position++;
        } else {
          return value;
        }
      }
    }

    const start = this.position;
    while (
      this.position < this.text.length &&
      !RESERVED_CHARS.includes(this.text.charAt(this.position))
    ) {
      this.position++;
    }

    if (start === this.position) {
      throw this.error(`expected identifier but found ${this.describe()}`);
    }
    return this.text.slice(start, this.position);
  }

  private parseNumber(): number {
    NUMBER_PATTERN.lastIndex = this.position;
    const match = NUMBER_PATTERN.exec(this.text);

    if (!match) {
      throw this.error(`expected number but found ${this.describe()}`);
    }
    this.position += match[0].length;
    return Number(match[0]);
  }

  private skipIgnored(): void {
    while (this.position < this.text.length) {
      const ch = this.peek();

      if (/\s/.test(ch)) {
        this.position++;
      } else if (ch === '[' && !this.text.startsWith(NHX_START, this.position)) {
        const end = this.text.indexOf(']', this.position);
        if (end === -1) {
          throw this.error('unterminated comment');
        }
        this.position = end + 1;
      } else {
        return;
      }
    }
  }

  private expect(ch: string): void {
    this.skipIgnored();
    if (this.peek() !== ch) {
      throw this.error(`expected '${ch}' but found ${this.describe()}`);
    }
    this.position++;
  }

  /** 現在位置の文字。終端では空文字 */
  private peek(): string {
    return this.text.charAt(this.position);
  }

  private describe(): string {
    return this.position >= this.text.length ? '<end>' : `'${this.peek()}'`;
  }

  private error(message: string): ParseError {
    return new ParseError(message, this.position);
  }
}

function encodeIdent(value: string): string {
  if (!NEEDS_QUOTING.test(value)) {
    return value;
  }
  return `"${value.replace(/"/g, '""')}"`;
}

function encodeSubtree(node: EventTree, isRoot: boolean): string {
  let result = '';

  if (node.children.length > 0) {
    result += `(${node.children.map((child) => encodeSubtree(child, false)).join(',')})`;
  }
  if (node.name !== '') {
    result += encodeIdent(node.name);
  }
  // ルートのタグは空でも必ず出力する（空の [&&NHX] を受け付けないパーサがあるため event=none を書く）
  if (isRoot || node.event !== 'none') {
    result += `[&&NHX:${EVENT_KEY}=${node.event}]`;
  }
  return result;
}

/**
 * NHX テキストからイベント木を1つ読み込む
 * @throws ParseError 構文が不正な場合
 */
export function decodeTree(text: string): EventTree {
  return new NhxParser(text).parse();
}

/**
 * イベント木を NHX テキストに書き出す（末尾の ';' を含む）
 */
export function encodeTree(tree: EventTree): string {
  return `${encodeSubtree(tree, true)};`;
}
