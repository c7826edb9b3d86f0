import { SpeakerTurn, TranscriptWord } from '../../database/entities';

export const UNKNOWN_SPEAKER = 'Unknown';

export const TURN_SEPARATOR = '\n\n';

/**
 * 说话人标识转为展示名称
 * speaker_0 -> Speaker 0，任何非字母字符之后的字母都大写（speaker_0a -> Speaker 0A）
 */
export function formatSpeakerLabel(speakerId: string): string {
  return speakerId
    .replace(/_/g, ' ')
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, prefix: string, letter: string) => {
      return prefix + letter.toUpperCase();
    });
}

/**
 * 按说话人变化把词序列切分为轮次
 * 同一说话人的连续词合并为一个轮次，与时间间隔无关
 */
export function reconstructTurns(words: readonly TranscriptWord[]): SpeakerTurn[] {
  const turns: SpeakerTurn[] = [];
  // null 表示还没有遇到任何说话人
  let currentSpeaker: string | null = null;
  let buffer: string[] = [];

  const flush = (speakerId: string) => {
    turns.push({
      speaker_label: formatSpeakerLabel(speakerId),
      content: buffer.join(' '),
    });
  };

  for (const word of words) {
    const text = word.text ?? '';
    const speakerId = word.speaker_id ?? UNKNOWN_SPEAKER;

    if (speakerId !== currentSpeaker) {
      if (currentSpeaker !== null) {
        flush(currentSpeaker);
      }
      currentSpeaker = speakerId;
      buffer = [text];
    } else {
      buffer.push(text);
    }
  }

  if (currentSpeaker !== null) {
    flush(currentSpeaker);
  }

  return turns;
}

export function formatTurns(turns: readonly SpeakerTurn[]): string {
  return turns.map((turn) => `**${turn.speaker_label}**: ${turn.content}`).join(TURN_SEPARATOR);
}

/**
 * 生成带说话人标注的转录文本，空输入返回空字符串
 */
export function formatDiarizedTranscript(words: readonly TranscriptWord[]): string {
  return formatTurns(reconstructTurns(words));
}
