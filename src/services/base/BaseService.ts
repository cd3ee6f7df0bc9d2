// src/services/base/BaseService.ts
import { ServiceConfig, Logger } from './types';

/** Common root of the analysis services: every one of them logs through an injected logger. */
export abstract class BaseService {
    protected readonly logger: Logger;

    constructor(config: ServiceConfig) {
        this.logger = config.logger;
    }
}
