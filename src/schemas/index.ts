// 機能別スキーマ
export * from './sweep';
export * from './config';
export * from './summary';
export * from './worker';

// バリデーション関数
export * from './validators';
