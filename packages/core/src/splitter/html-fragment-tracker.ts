import type { SavedTag, TagHierarchy } from '@content-splitter/types';
import { byteLength } from './byte-length.js';

/**
 * HTMLフラグメントの組み立てとタグ階層の追跡を行うクラス
 *
 * 1回の分割処理につき1インスタンス。開いているタグのスタックと、
 * 次のフラグメントで開き直すための開きタグ（属性付きの元テキスト）を保持する。
 */
export class HtmlFragmentTracker {
  /** 開いているタグ名 */
  private readonly stack: string[] = [];
  /** stackと並行する開きタグの記録 */
  private readonly savedTags: SavedTag[] = [];
  /** 組み立て中のフラグメント */
  private pieces: string[] = [];
  private length = 0;

  constructor(private readonly maxLength: number) {}

  /** 組み立て中のフラグメントのバイト数（閉じタグを除く） */
  get currentLength(): number {
    return this.length;
  }

  /** フラグメントが未開始か */
  get isEmpty(): boolean {
    return this.pieces.length === 0;
  }

  /** 開いているタグの数 */
  get depth(): number {
    return this.stack.length;
  }

  /** 開いているタグ名（外側から順） */
  get openTags(): readonly string[] {
    return [...this.stack];
  }

  /**
   * 現在の階層の開きタグ・閉じタグ
   * 開きタグは外側から、閉じタグは内側から並ぶ
   */
  tagHierarchy(): TagHierarchy {
    const opening = this.savedTags.map((tag) => tag.rawTag).join('');
    const closing = [...this.stack]
      .reverse()
      .map((name) => `</${name}>`)
      .join('');
    return { opening, closing };
  }

  /**
   * contentを追加すると、閉じタグ込みで最大バイト数を超えるか
   */
  wouldExceed(content: string): boolean {
    const { closing } = this.tagHierarchy();
    return this.length + byteLength(content) + byteLength(closing) > this.maxLength;
  }

  /**
   * 閉じタグを付けてフラグメントを確定する
   * 空の場合は空文字列
   */
  flush(): string {
    if (this.isEmpty) {
      return '';
    }
    const { closing } = this.tagHierarchy();
    this.pieces.push(closing);
    return this.pieces.join('');
  }

  /**
   * 開いているタグを開き直した状態で新しいフラグメントを始める
   */
  startFragment(): void {
    const { opening } = this.tagHierarchy();
    this.pieces = [opening];
    this.length = byteLength(opening);
  }

  addContent(text: string): void {
    this.pieces.push(text);
    this.length += byteLength(text);
  }

  /**
   * 閉じタグの処理
   * スタック先頭と名前が一致しない場合は無視する
   */
  onClosingTag(name: string): void {
    if (this.stack.length > 0 && this.stack[this.stack.length - 1] === name) {
      this.stack.pop();
      this.savedTags.pop();
    }
  }

  /**
   * 開きタグの処理（自己終了タグでは呼ばないこと）
   */
  onOpeningTag(rawTag: string, name: string): void {
    this.stack.push(name);
    this.savedTags.push({ rawTag, name });
  }
}
