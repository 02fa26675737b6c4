export interface INotificationSink {
  sendMessage(destinationId: string, message: string): Promise<void>;
}
