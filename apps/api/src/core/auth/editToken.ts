import jwt from 'jsonwebtoken';

export const EDIT_SCOPE = 'event:edit';

export interface EditTokenPayload {
  sub: string; // eventId
  scope: typeof EDIT_SCOPE;
}

// Sin expiración: el link de edición vive lo mismo que el evento
export function signEditToken(eventId: string, secret: string) {
  const payload: EditTokenPayload = {
    sub: eventId,
    scope: EDIT_SCOPE
  };

  return jwt.sign(payload, secret, { algorithm: 'HS256' });
}

export function verifyEditToken(token: string, secret: string): EditTokenPayload {
  const decoded = jwt.verify(token, secret, { algorithms: ['HS256'] });

  // jwt.verify puede devolver string | object
  if (
    typeof decoded === 'string' ||
    typeof decoded.sub !== 'string' ||
    decoded.scope !== EDIT_SCOPE
  ) {
    throw new Error('Invalid token payload');
  }

  return { sub: decoded.sub, scope: EDIT_SCOPE };
}
