import { HttpException, HttpStatus } from '@nestjs/common';

export class RateLimitExceededException extends HttpException {
  constructor(public readonly retryAfterMs: number) {
    super({ statusCode: HttpStatus.TOO_MANY_REQUESTS, message: 'Too Many Requests.' }, HttpStatus.TOO_MANY_REQUESTS);
  }
}
