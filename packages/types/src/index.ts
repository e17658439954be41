export type EventRecord = {
  id: string;
  title: string;
  content: string;
  isPublic: boolean;
  viewCount: number;
  createdAt: string;
  updatedAt: string;
};

// Lo que ve un visitante (sin contadores ni flags internos)
export type PublicEvent = Pick<
  EventRecord,
  'id' | 'title' | 'content' | 'updatedAt'
>;

export type EventLinks = {
  page: string;
  qrPng: string;
  qrSvg: string;
};

export type CreateEventResponse = {
  event: EventRecord;
  editToken: string;
  links: EventLinks;
  qr: {
    url: string;
    dataUrl: string;
  };
};

export type ApiError = {
  error: string;
  details: unknown;
};
