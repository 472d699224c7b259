import { describe, it, expect } from 'vitest';
import { buildItineraryPrompt, formatReferenceNotes, type ItineraryPromptParams } from './prompt';

const createParams = (overrides: Partial<ItineraryPromptParams> = {}): ItineraryPromptParams => ({
  destination: '成都',
  days: 3,
  startDate: '2025-06-01',
  interests: ['美食', '历史'],
  foodPreferences: ['川菜'],
  travelers: '2位成人',
  budgetMin: 3000,
  budgetMax: 5000,
  ...overrides,
});

describe('buildItineraryPrompt', () => {
  it('should include the trip facts', () => {
    const prompt = buildItineraryPrompt(createParams());
    expect(prompt).toContain('目的地：成都\n出发日期：2025-06-01\n旅行天数：3天');
    expect(prompt).toContain('旅行偏好：美食、历史');
    expect(prompt).toContain('饮食偏好：川菜');
    expect(prompt).toContain('预算范围：3000 - 5000 元');
    expect(prompt).toContain('顶层键为 day_1 到 day_3');
  });

  it('should name a single key for one-day trips', () => {
    expect(buildItineraryPrompt(createParams({ days: 1 }))).toContain('顶层键为 day_1（');
  });

  it('should fill in empty preferences and travelers', () => {
    const prompt = buildItineraryPrompt(createParams({ interests: [], foodPreferences: [' '], travelers: '' }));
    expect(prompt).toContain('旅行偏好：无特殊偏好');
    expect(prompt).toContain('饮食偏好：无特殊偏好');
    expect(prompt).toContain('出行人员：未说明');
  });

  it('should be deterministic', () => {
    expect(buildItineraryPrompt(createParams())).toBe(buildItineraryPrompt(createParams()));
  });

  it('should omit the reference block without notes', () => {
    expect(buildItineraryPrompt(createParams())).not.toContain('【优先参考】');
  });

  it('should place reference notes before the format instructions', () => {
    const prompt = buildItineraryPrompt(createParams({
      referenceNotes: [{ noteId: 'n1', title: '成都三日游', content: '先去宽窄巷子', tags: [] }],
    }));
    const referenceAt = prompt.indexOf('【优先参考】');
    expect(referenceAt).toBeGreaterThan(-1);
    expect(referenceAt).toBeLessThan(prompt.indexOf('请按照以下JSON格式'));
    expect(prompt).toContain('笔记：成都三日游\n先去宽窄巷子\n【优先参考结束】');
  });
});

describe('formatReferenceNotes', () => {
  it('should render tags and separate notes with a blank line', () => {
    const text = formatReferenceNotes([
      { noteId: 'a', title: 'A', content: 'alpha', tags: ['美食', '夜景'] },
      { noteId: 'b', title: 'B', content: 'beta', tags: [] },
    ]);
    expect(text).toBe('笔记：A\nalpha\n标签：美食、夜景\n\n笔记：B\nbeta');
  });
});
