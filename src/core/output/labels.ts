export interface ReportLabels {
  title: string;
  videoCount: (count: number) => string;
  channel: string;
  watch: string;
  unavailable: string;
  empty: string;
  emailSubject: (date: string, count: number) => string;
  emailBody: (date: string, count: number) => string;
}

const LABELS: Record<string, ReportLabels> = {
  en: {
    title: 'YouTube Daily Digest',
    videoCount: (count) => `${count} video${count === 1 ? '' : 's'}`,
    channel: 'Channel',
    watch: 'Watch',
    unavailable: 'Summary unavailable. Watch the video through the link above.',
    empty: 'No new videos today.',
    emailSubject: (date, count) => `YouTube Daily Digest - ${date} (${count})`,
    emailBody: (date, count) =>
      `Hello,\n\nAttached is the YouTube digest for ${date} with summaries of ${count} new video${count === 1 ? '' : 's'} from your subscriptions.\n`,
  },
  ko: {
    title: 'YouTube 데일리 요약',
    videoCount: (count) => `영상 ${count}개`,
    channel: '채널',
    watch: '영상 보기',
    unavailable: '요약을 가져오지 못했습니다. 위 링크에서 영상을 확인하세요.',
    empty: '오늘은 새 영상이 없습니다.',
    emailSubject: (date, count) => `YouTube 데일리 요약 - ${date} (${count}개)`,
    emailBody: (date, count) =>
      `안녕하세요.\n\n${date} 구독 채널의 새 영상 ${count}개 요약을 첨부한 PDF로 보내드립니다.\n`,
  },
  ja: {
    title: 'YouTube デイリーダイジェスト',
    videoCount: (count) => `動画 ${count}件`,
    channel: 'チャンネル',
    watch: '動画を見る',
    unavailable: '要約を取得できませんでした。上のリンクから動画をご覧ください。',
    empty: '本日の新着動画はありません。',
    emailSubject: (date, count) => `YouTube デイリーダイジェスト - ${date} (${count}件)`,
    emailBody: (date, count) =>
      `こんにちは。\n\n${date} の登録チャンネルの新着動画 ${count}件の要約を PDF で添付しました。\n`,
  },
  zh: {
    title: 'YouTube 每日摘要',
    videoCount: (count) => `共${count}个视频`,
    channel: '频道',
    watch: '观看视频',
    unavailable: '该视频的摘要暂时无法获取，请通过上方链接观看完整视频。',
    empty: '今天没有新视频。',
    emailSubject: (date, count) => `YouTube 每日摘要 - ${date} (共${count}个视频)`,
    emailBody: (date, count) => `您好！\n\n附件是 ${date} 订阅频道 ${count} 个新视频的摘要报告。\n`,
  },
};

export function getLabels(locale: string): ReportLabels {
  return LABELS[locale] || LABELS.en;
}
