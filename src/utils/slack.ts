import axios, { AxiosInstance } from "axios";

export interface Notifier {
  notify(message: string): Promise<void>;
}

/** Posts operator alerts to a Slack incoming webhook. Never throws. */
export class SlackNotifier implements Notifier {
  constructor(
    private readonly webhookUrl: string,
    private readonly http: Pick<AxiosInstance, "post"> = axios
  ) {}

  async notify(message: string): Promise<void> {
    if (!this.webhookUrl) {
      console.warn("SLACK_WEBHOOK_URL not configured.");
      return;
    }

    try {
      await this.http.post(this.webhookUrl, { text: message });
    } catch (err) {
      console.error("Error sending message to Slack:", err);
    }
  }
}
