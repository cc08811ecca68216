import { describe, it, expect } from 'vitest';

import { topicFromKey, toTopicKey } from '../../../src/utils/topic-key';

describe('toTopicKey', () => {
  it.each([
    ['Renewable Energy Storage', 'Renewable_Energy_Storage'],
    ['Café culture: 2024?', 'Cafe_culture_2024'],
    ['  heat   pumps  ', 'heat_pumps'],
    ['grid-scale storage', 'grid-scale_storage'],
    ['Wind & solar', 'Wind_solar'],
    ['***', 'untitled'],
    ['能源储存', '能源储存'],
    ['Энергетика будущего', 'Энергетика_будущего'],
    ['에너지 저장', '에너지_저장'],
  ])('%s -> %s', (topic, key) => {
    expect(toTopicKey(topic)).toBe(key);
  });

  it('gives distinct non-Latin topics distinct keys', () => {
    expect(toTopicKey('能源储存')).not.toBe(toTopicKey('Энергетика'));
  });
});

describe('topicFromKey', () => {
  it('restores spaces', () => {
    expect(topicFromKey('Renewable_Energy_Storage')).toBe('Renewable Energy Storage');
  });
});
