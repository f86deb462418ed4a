import type { JWT } from '@fastify/jwt';
import type { SessionSubject } from '@phonekey/domain';

declare module '@fastify/jwt' {
  interface FastifyJWT {
    payload: SessionSubject;
    user: SessionSubject;
  }
}

export interface SessionIssuer {
  issue(subject: SessionSubject): Promise<string>;
}

export class JwtSessionIssuer implements SessionIssuer {
  constructor(
    private readonly jwt: JWT,
    private readonly expiresIn: string
  ) {}

  async issue(subject: SessionSubject): Promise<string> {
    return this.jwt.sign({ userId: subject.userId, phoneE164: subject.phoneE164 }, { expiresIn: this.expiresIn });
  }
}
