import { Injectable } from '@nestjs/common';
import { RadarSummary, Theme } from '../types/radar.types';

const ARROW_SYMBOL: Record<Theme['arrow'], string> = {
  up: '↑',
  flat: '→',
  down: '↓',
};

// Fixed templates over the top themes; no generated prose.
@Injectable()
export class RadarSummaryService {
  summarize(themes: readonly Theme[], topN = 5): RadarSummary {
    const top = themes.slice(0, topN);
    return {
      executiveSummary: this.executiveSummary(top),
      discussionTopics: this.discussionTopics(top),
    };
  }

  private executiveSummary(top: readonly Theme[]): string {
    const lines = [
      'What this radar covers',
      '- Signals collected from trusted sources (regulators, infrastructure, research and capital).',
      '- Scores reflect quantity and diversity of supporting datapoints under fixed weights.',
      '',
      'What is moving right now (top themes)',
    ];
    if (top.length === 0) {
      lines.push('- No themes scored in this build.');
    }
    for (const theme of top) {
      lines.push(
        `- ${theme.name} (score ${theme.score.value}, ${ARROW_SYMBOL[theme.arrow]}, confidence ${theme.confidence}, movements ${theme.movementCount})`,
      );
    }
    lines.push('', 'Notes', '- Every score links to its audit trail.');
    return lines.join('\n');
  }

  private discussionTopics(top: readonly Theme[]): string {
    const questions = top.flatMap((theme) => [
      `- For ${theme.name}: what would we need to test in 60-90 days to learn fast?`,
      `- For ${theme.name}: where are we exposed if this becomes standard in 3-5 years?`,
    ]);
    return ['Discussion topics', ...questions.slice(0, 10)].join('\n');
  }
}
