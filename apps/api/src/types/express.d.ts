import type { EditTokenPayload } from '../core/auth/editToken';

declare global {
  namespace Express {
    interface EditorPayload {
      eventId: string;
      tokenPayload: EditTokenPayload;
    }

    interface Request {
      editor?: EditorPayload;
    }
  }
}

export {};
