import { describe, it, expect } from 'vitest';
import { buildBarChartSvg, escapeXml } from '../../src/services/chartRenderer';

const occurrences = (text: string, needle: string) => text.split(needle).length - 1;

describe('Chart rendering', () => {
  it('should escape markup in titles and labels', () => {
    expect(escapeXml(`<b class="x">Tom's & Jerry's</b>`)).toBe(
      '&lt;b class=&quot;x&quot;&gt;Tom&apos;s &amp; Jerry&apos;s&lt;/b&gt;',
    );

    const svg = buildBarChartSvg({ title: 'Tea & <cakes>', labels: ['a'], values: [1] });
    expect(svg).toContain('>Tea &amp; &lt;cakes&gt;</text>');
  });

  it('should draw one bar per bucket and highlight only the peak', () => {
    const svg = buildBarChartSvg({
      title: 'Activity',
      labels: ['Mon', 'Tue', 'Wed'],
      values: [1, 3, 0],
    });

    // background plus three bars
    expect(occurrences(svg, '<rect ')).toBe(4);
    expect(occurrences(svg, 'fill="#FF9800"')).toBe(1);
    expect(occurrences(svg, 'fill="#4CAF50"')).toBe(2);
  });

  it('should draw an empty series without a peak or value labels', () => {
    const labels = Array.from({ length: 31 }, (_, i) => String(i + 1));
    const svg = buildBarChartSvg({ title: 'March', labels, values: labels.map(() => 0) });

    expect(svg).not.toContain('#FF9800');
    // title plus every second day label
    expect(occurrences(svg, '</text>')).toBe(17);
    expect(svg).toContain('>1</text>');
    expect(svg).toContain('>31</text>');
    expect(svg).not.toContain('>2</text>');
  });

  it('should reject series whose labels and values differ in length', () => {
    expect(() => buildBarChartSvg({ title: 'Bad', labels: ['a', 'b'], values: [1] })).toThrow(
      'Chart series mismatch: 2 labels, 1 values',
    );
  });
});
