import { SpeechToTextResult } from '../../providers/elevenlabs/elevenlabs.service';

// 演示模式下每个文件返回的固定结果
const DEMO_TURNS: Array<{ speaker_id: string; text: string }> = [
  {
    speaker_id: 'speaker_0',
    text: 'Mr. John Smith specifically mentioned the breach of contract occurring on July 15th, 2023.',
  },
  {
    speaker_id: 'speaker_1',
    text: 'We never agreed to those terms in the initial MSA.',
  },
];

export function getDemoTranscription(): SpeechToTextResult {
  return {
    text: DEMO_TURNS.map((turn) => turn.text).join(' '),
    language_code: 'en',
    words: DEMO_TURNS.flatMap((turn) =>
      turn.text.split(' ').map((text) => ({ text, speaker_id: turn.speaker_id })),
    ),
    entities: [
      { text: 'John Smith', type: 'person' },
      { text: 'July 15th, 2023', type: 'date' },
      { text: 'MSA', type: 'contract' },
    ],
  };
}
