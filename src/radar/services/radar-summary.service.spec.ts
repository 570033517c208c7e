import { makeBuild } from '../testing/radar.fixtures';
import { RadarSummaryService } from './radar-summary.service';

describe('RadarSummaryService', () => {
  let service: RadarSummaryService;

  beforeEach(() => {
    service = new RadarSummaryService();
  });

  it('lists top themes with score, arrow and confidence', () => {
    const { themes } = makeBuild();

    const summary = service.summarize(themes);

    expect(summary.executiveSummary.split('\n')).toContain(
      '- Money & Deposit Architecture (score 76, →, confidence low, movements 1)',
    );
    expect(summary.discussionTopics.split('\n')).toEqual([
      'Discussion topics',
      '- For Money & Deposit Architecture: what would we need to test in 60-90 days to learn fast?',
      '- For Money & Deposit Architecture: where are we exposed if this becomes standard in 3-5 years?',
    ]);
  });

  it('notes an empty build', () => {
    const summary = service.summarize([]);

    expect(summary.executiveSummary.split('\n')).toContain(
      '- No themes scored in this build.',
    );
    expect(summary.discussionTopics).toBe('Discussion topics');
  });
});
