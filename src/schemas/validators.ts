import { z } from 'zod';

// 汎用バリデーション関数
export function validateRequest<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
  try {
    return schema.parse(data);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const messages = error.errors.map((err) => `${err.path.join('.') || '(root)'}: ${err.message}`);
      throw new Error(`バリデーションエラー: ${messages.join(', ')}`);
    }
    throw error;
  }
}

// 永続化データ読み込み用バリデーション
export function validateStored<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  source: string,
): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    console.error(`保存データのバリデーションエラー (${source}):`, result.error.issues);
    throw new Error(`内部エラー: ${source} の形式が正しくありません`);
  }
  return result.data;
}
