import { Bonjour, type Service } from 'bonjour-service';
import * as os from 'os';
import { MDNS_SERVICE_TYPE } from '../../shared/constants.js';
import { createLogger } from '../../shared/utils/logger.js';
import { VERSION } from '../version.js';

const log = createLogger('mdns-service');

export class MDNSService {
  private bonjour: Bonjour | null = null;
  private service: Service | null = null;
  private isAdvertising = false;

  /**
   * Start advertising the command server via mDNS/Bonjour
   */
  async startAdvertising(port: number, instanceName?: string): Promise<void> {
    if (this.isAdvertising) {
      log.warn('mDNS service already advertising');
      return;
    }

    try {
      const bonjour = new Bonjour();
      this.bonjour = bonjour;

      const name = instanceName || os.hostname() || 'Remote Deck';

      this.service = bonjour.publish({
        name,
        type: MDNS_SERVICE_TYPE,
        protocol: 'tcp',
        port,
        txt: {
          version: VERSION,
          platform: process.platform,
        },
      });

      this.isAdvertising = true;
      log.log(`Started mDNS advertisement: ${name} on port ${port}`);

      this.service.on('up', () => {
        log.debug('mDNS service is up');
      });
      this.service.on('error', (...args: unknown[]) => {
        log.error('mDNS service error:', args[0]);
      });
    } catch (error) {
      log.error('Failed to start mDNS advertisement:', error);
      throw error;
    }
  }

  /**
   * Stop advertising the service
   */
  async stopAdvertising(): Promise<void> {
    if (!this.isAdvertising) {
      return;
    }

    try {
      const bonjour = this.bonjour;
      if (bonjour) {
        await new Promise<void>((resolve) => {
          bonjour.unpublishAll(() => {
            log.debug('mDNS service unpublished');
            resolve();
          });
        });
        bonjour.destroy();
      }
      this.service = null;
      this.bonjour = null;
      this.isAdvertising = false;
      log.log('Stopped mDNS advertisement');
    } catch (error) {
      log.error('Error stopping mDNS advertisement:', error);
    }
  }

  isActive(): boolean {
    return this.isAdvertising;
  }
}
