/**
 * UTF-8バイト数の計測
 */

/**
 * テキストのUTF-8バイト数
 */
export function byteLength(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}

/**
 * テキストを最大maxBytesバイトの断片に切り分ける
 * コードポイントの途中では切らない（1コードポイントがmaxBytesを超える場合はそれ単独で1断片）
 */
export function splitAtByteBoundary(text: string, maxBytes: number): string[] {
  const pieces: string[] = [];
  let current = '';
  let currentBytes = 0;

  for (const char of text) {
    const charBytes = byteLength(char);
    if (currentBytes + charBytes > maxBytes && current) {
      pieces.push(current);
      current = '';
      currentBytes = 0;
    }
    current += char;
    currentBytes += charBytes;
  }

  if (current) {
    pieces.push(current);
  }
  return pieces;
}
