import { describe, it, expect, beforeEach } from 'vitest';
import { HtmlFragmentTracker } from '../html-fragment-tracker.js';

describe('HtmlFragmentTracker', () => {
  let tracker: HtmlFragmentTracker;

  beforeEach(() => {
    tracker = new HtmlFragmentTracker(20);
  });

  describe('tagHierarchy()', () => {
    it('タグがなければ空文字列', () => {
      expect(tracker.tagHierarchy()).toEqual({ opening: '', closing: '' });
    });

    it('divとpを開いた後の開きタグ・閉じタグ', () => {
      tracker.onOpeningTag('<div>', 'div');
      tracker.onOpeningTag('<p>', 'p');

      expect(tracker.tagHierarchy()).toEqual({
        opening: '<div><p>',
        closing: '</p></div>',
      });
    });

    it('開きタグは属性付きの元テキストを保持する', () => {
      tracker.onOpeningTag('<div class="note" id="n1">', 'div');
      tracker.onOpeningTag('<a href="/x">', 'a');

      expect(tracker.tagHierarchy()).toEqual({
        opening: '<div class="note" id="n1"><a href="/x">',
        closing: '</a></div>',
      });
    });
  });

  describe('onClosingTag()', () => {
    it('スタック先頭と一致すれば取り除く', () => {
      tracker.onOpeningTag('<div>', 'div');
      tracker.onOpeningTag('<p>', 'p');
      tracker.onClosingTag('p');

      expect(tracker.depth).toBe(1);
      expect(tracker.openTags).toEqual(['div']);
      expect(tracker.tagHierarchy()).toEqual({ opening: '<div>', closing: '</div>' });
    });

    it('スタック先頭と一致しない閉じタグは無視する', () => {
      tracker.onOpeningTag('<div>', 'div');
      tracker.onOpeningTag('<p>', 'p');
      tracker.onClosingTag('div');

      expect(tracker.openTags).toEqual(['div', 'p']);
    });

    it('スタックが空でもエラーにならない', () => {
      expect(() => tracker.onClosingTag('span')).not.toThrow();
      expect(tracker.depth).toBe(0);
    });
  });

  describe('wouldExceed()', () => {
    it('閉じタグのバイト数を含めて判定する', () => {
      tracker.onOpeningTag('<div>', 'div');
      tracker.startFragment();

      // 5 (<div>) + 9 + 6 (</div>) = 20
      expect(tracker.wouldExceed('123456789')).toBe(false);
      // 5 + 10 + 6 = 21
      expect(tracker.wouldExceed('1234567890')).toBe(true);
    });

    it('UTF-8のバイト数で判定する', () => {
      const small = new HtmlFragmentTracker(4);
      // 「あ」は3バイト
      expect(small.wouldExceed('あ')).toBe(false);
      expect(small.wouldExceed('ああ')).toBe(true);
    });
  });

  describe('フラグメントの組み立て', () => {
    it('未開始のフラグメントをflushすると空文字列', () => {
      expect(tracker.isEmpty).toBe(true);
      expect(tracker.flush()).toBe('');
    });

    it('addContentでバイト数が加算される', () => {
      tracker.startFragment();
      tracker.addContent('é');
      tracker.addContent('ab');

      expect(tracker.currentLength).toBe(4);
    });

    it('flushで閉じタグが付く', () => {
      tracker.onOpeningTag('<div>', 'div');
      tracker.startFragment();
      tracker.addContent('x');

      expect(tracker.flush()).toBe('<div>x</div>');
    });

    it('startFragmentで開いているタグを開き直す', () => {
      tracker.onOpeningTag('<section data-id="7">', 'section');
      tracker.onOpeningTag('<p>', 'p');
      tracker.startFragment();

      expect(tracker.isEmpty).toBe(false);
      expect(tracker.currentLength).toBe('<section data-id="7"><p>'.length);

      tracker.addContent('rest');
      expect(tracker.flush()).toBe('<section data-id="7"><p>rest</p></section>');
    });

    it('タグがなくてもstartFragment後は空でない扱い', () => {
      tracker.startFragment();

      expect(tracker.isEmpty).toBe(false);
      expect(tracker.currentLength).toBe(0);
      expect(tracker.flush()).toBe('');
    });
  });
});
