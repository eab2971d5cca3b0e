import type { TextSink } from './sink.js';

/**
 * Writes `<a, b, c>` for a non-empty sequence and nothing for an empty one.
 * Elements keep their order; `writeItem` renders a single element.
 */
export function writeAngle<T>(
  sink: TextSink,
  items: readonly T[],
  writeItem: (item: T) => void
): void {
  if (items.length === 0) return;
  sink.write('<');
  items.forEach((item, index) => {
    if (index > 0) sink.write(', ');
    writeItem(item);
  });
  sink.write('>');
}
