import { makeLogger } from '@rp/logger';

export const logger = makeLogger('playtester');
