import { formatBytes, formatCount, formatTime, getTableTypeIcon } from '../format';

describe('formatBytes', () => {
  it('prints small sizes in bytes', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(1023)).toBe('1023 B');
  });

  it('uses binary units with one decimal', () => {
    expect(formatBytes(1024)).toBe('1.0 KB');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(1024 * 1024)).toBe('1.0 MB');
    expect(formatBytes(5 * 1024 ** 3)).toBe('5.0 GB');
  });
});

describe('formatTime', () => {
  it('prints N/A for a zero timestamp', () => {
    expect(formatTime(0)).toBe('N/A');
  });

  it('prints a short local timestamp', () => {
    expect(formatTime(new Date(2024, 0, 2, 15, 4).getTime())).toBe('Jan 2 15:04');
    expect(formatTime(new Date(2024, 11, 25, 9, 5).getTime())).toBe('Dec 25 09:05');
  });
});

describe('getTableTypeIcon', () => {
  it('maps table types to icons', () => {
    expect(getTableTypeIcon('TABLE')).toBe('📋');
    expect(getTableTypeIcon('view')).toBe('👁️');
    expect(getTableTypeIcon('MATERIALIZED_VIEW')).toBe('💎');
    expect(getTableTypeIcon('EXTERNAL')).toBe('❓');
  });
});

describe('formatCount', () => {
  it('groups thousands', () => {
    expect(formatCount(1234567)).toBe('1,234,567');
    expect(formatCount(0)).toBe('0');
  });
});
