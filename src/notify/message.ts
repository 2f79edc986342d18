export interface DigestMessage {
  title: string;
  body: string;
  text: string;
}

export function buildDigestMessage(
  repository: string,
  reportDate: string,
  summary: string
): DigestMessage {
  const title = `*Daily activity digest: ${repository} (${reportDate})*`;
  return { title, body: summary, text: `${title}\n\n${summary}` };
}
