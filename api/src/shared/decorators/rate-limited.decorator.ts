import { SetMetadata } from '@nestjs/common';

export const RATE_LIMITED_KEY = 'rate_limited';
export const RateLimited = () => SetMetadata(RATE_LIMITED_KEY, true);
