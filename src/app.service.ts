import { Injectable } from '@nestjs/common';
import { SCORING_VERSION, SERVICE_NAME } from './radar/config/radar.constants';

@Injectable()
export class AppService {
  getInfo(): { service: string; version: string; scoringVersion: string } {
    return {
      service: SERVICE_NAME,
      version: '1.0.0',
      scoringVersion: SCORING_VERSION,
    };
  }
}
