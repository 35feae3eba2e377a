// Wire format of a data notification as delivered by the broker.
export interface NotificationLink {
  rel: string;
  href: string;
  type?: string;
  length?: number;
}

export interface NotificationIntegrity {
  method: string;
  value: string;
}

export interface NotificationPayload {
  id?: string;
  properties: {
    data_id: string;
    pubtime?: string;
    integrity?: NotificationIntegrity;
  };
  links: NotificationLink[];
}

export interface RawNotification {
  topic: string;
  payload: string | Buffer;
}
