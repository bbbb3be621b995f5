import type { ResolvedAsset } from "./escrow.js";

export interface EscrowCreatedNotification {
  type: "escrow.created";
  escrowId: number;
  owner: string;
  amount: bigint;
  asset: ResolvedAsset;
  deadline: Date;
  descriptionRef: string;
  transferRef?: string;
}

export interface EscrowCompletedNotification {
  type: "escrow.completed";
  escrowId: number;
  recipient: string;
  amount: bigint;
  asset: ResolvedAsset;
  transferRef?: string;
}

// emitted by both requestRefund and cancel
export interface EscrowRefundedNotification {
  type: "escrow.refunded";
  escrowId: number;
  owner: string;
  amount: bigint;
  asset: ResolvedAsset;
  transferRef?: string;
}

export interface PrimaryTokenUpdatedNotification {
  type: "config.primary_token_updated";
  previousAddress: string;
  address: string;
  updatedBy: string;
}

export interface WatchdogReminderNotification {
  type: "escrow.watchdog.reminder";
  escrowId: number;
  owner: string;
  hoursBefore: number;
}

export interface WatchdogRefundableNotification {
  type: "escrow.watchdog.refundable";
  escrowId: number;
  owner: string;
  deadline: Date;
}

export type EscrowNotification =
  | EscrowCreatedNotification
  | EscrowCompletedNotification
  | EscrowRefundedNotification
  | PrimaryTokenUpdatedNotification
  | WatchdogReminderNotification
  | WatchdogRefundableNotification;

export type NotificationType = EscrowNotification["type"];

export interface NotificationRecord {
  id: string;
  type: NotificationType;
  notification: EscrowNotification;
  createdAt: Date;
}

export interface NotificationSink {
  publish(notification: EscrowNotification): void | Promise<void>;
}
