import { PubSub, type Topic } from '@google-cloud/pubsub';
import { logger } from '../logger.js';
import type { FailureNotification, Notifier } from '../tasks/dead-letter.js';

export interface PubSubNotifierOptions {
  projectId?: string;
  topic: string;
}

const SUBJECTS: Readonly<Record<FailureNotification['errorType'], string>> = {
  memory: 'MEMORY LIMIT EXCEEDED',
  timeout: 'PROCESSING TIMEOUT',
  processing: 'PROCESSING ERROR',
};

export class PubSubNotifier implements Notifier {
  private readonly topic: Topic;

  constructor(private readonly options: PubSubNotifierOptions) {
    const pubsub = new PubSub({ projectId: options.projectId });
    this.topic = pubsub.topic(options.topic);
  }

  /** Publish failures are logged, never thrown; the task record is already settled. */
  async notify(notification: FailureNotification): Promise<void> {
    try {
      await this.topic.publishMessage({
        json: notification,
        attributes: {
          taskId: notification.taskId,
          taskType: notification.taskType,
          errorType: SUBJECTS[notification.errorType],
        },
      });
      logger.info(
        { taskId: notification.taskId, errorType: notification.errorType, topic: this.options.topic },
        'Published failure notification',
      );
    } catch (err) {
      logger.error({ err, taskId: notification.taskId }, 'Failed to publish failure notification');
    }
  }
}
