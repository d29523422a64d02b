export interface MailConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  from: string;
  to: string;
}

export interface DispatchResult {
  messageId: string;
  recipient: string;
}
