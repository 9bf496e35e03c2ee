/**
 * パラメータ値の表記を数値の列に展開する
 *
 * - `7`            単一の値
 * - `{1, 2, 3}`    値の列挙
 * - `[1:10]`       両端を含む範囲（`[1:10:3]` で刻み指定）
 * - `1,5`          終端を含まない範囲（`1,10,2` で刻み指定）
 */
export function parseParameterValues(text: string): [number, ...number[]] {
  const notation = text.trim();
  let values: number[];

  if (notation.startsWith('{') && notation.endsWith('}')) {
    values = notation
      .slice(1, -1)
      .split(',')
      .map((token) => parseNumber(token, text));
  } else if (notation.startsWith('[') && notation.endsWith(']')) {
    const [start, stop, step = 1] = parseBounds(notation.slice(1, -1).split(':'), text);
    values = expandRange(start, stop, step, true, text);
  } else if (notation.includes(',')) {
    const [start, stop, step = 1] = parseBounds(notation.split(','), text);
    values = expandRange(start, stop, step, false, text);
  } else {
    values = [parseNumber(notation, text)];
  }

  const [first, ...rest] = values;
  if (first === undefined) {
    throw new Error(`Parameter values "${text}" describe an empty sequence`);
  }
  return [first, ...rest];
}

function parseNumber(token: string, text: string): number {
  const trimmed = token.trim();
  const value = Number(trimmed);
  if (trimmed === '' || !Number.isFinite(value)) {
    throw new Error(`Invalid parameter values "${text}": "${trimmed}" is not a number`);
  }
  return value;
}

function parseBounds(tokens: string[], text: string): number[] {
  if (tokens.length < 2 || tokens.length > 3) {
    throw new Error(`Invalid parameter values "${text}": a range takes a start, a stop and an optional step`);
  }
  return tokens.map((token) => parseNumber(token, text));
}

function expandRange(
  start: number,
  stop: number,
  step: number,
  inclusive: boolean,
  text: string,
): number[] {
  if (step === 0) {
    throw new Error(`Invalid parameter values "${text}": step must not be zero`);
  }

  const values: number[] = [];
  for (let i = 0; ; i++) {
    // 刻みの累積による誤差を丸める
    const value = Number((start + i * step).toPrecision(12));
    const beyond = step > 0 ? value > stop : value < stop;
    if (beyond || (!inclusive && value === stop)) break;
    values.push(value);
  }
  return values;
}
