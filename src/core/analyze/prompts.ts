// src/core/analyze/prompts.ts
import type { Label, NormalizedRecord } from '../types/index.js';

export const VIDEO_ANALYSIS_PROMPT = `Give a detailed, timestamped breakdown of the whole video as JSON.
For every segment include what each speaker says, the tone, the setting and the key visual moments.
At the top level add a speaker description covering appearance, gender, style and personality.

Answer with JSON shaped like:
{
  "video_analysis": {
    "speaker_description": { "appearance": "", "gender": "", "style": "", "personality": "" },
    "timestamps": [
      {
        "time": "00:00-00:10",
        "dialogue": "",
        "tone": "",
        "setting_description": "",
        "key_visual_moments": "",
        "action_context": ""
      }
    ]
  }
}`;

/** Builds the follow-up prompt that asks why the post did or did not take off */
export function buildViralityPrompt(record: NormalizedRecord, label: Label | undefined, videoAnalysis: string): string {
  const lines = [
    `Caption: ${String(record.caption ?? '(none)')}`,
    `Author: ${String(record.username ?? 'unknown')}`,
    `Views: ${String(record.views ?? 'unknown')}`,
    `Likes: ${String(record.likes ?? 'unknown')}`,
    `Comments: ${String(record.comments ?? 'unknown')}`,
    `Shares: ${String(record.shares ?? 'unknown')}`,
  ];
  if (label?.score.engagement_rate !== undefined) {
    lines.push(`Engagement rate: ${(label.score.engagement_rate * 100).toFixed(2)}%`);
  }
  const verdict = label ? (label.viral ? 'went viral' : 'did not go viral') : 'has an unknown outcome';

  return `This short video ${verdict} by our thresholds.

Performance:
${lines.join('\n')}

Content breakdown:
${videoAnalysis}

Explain which hooks, pacing, emotional beats and visual choices most likely drove this outcome.
Answer with JSON: { "virality_analysis": { "summary": "", "drivers": [""], "weaknesses": [""] } }`;
}
