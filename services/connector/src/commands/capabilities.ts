import type { CapabilityAdvertisement } from '../types';
import type { ConnectorSettings } from './types';

export const API_VERSION = '2.0';
export const PATH_SEPARATOR = '/';

export function buildCapabilityAdvertisement(settings: ConnectorSettings): CapabilityAdvertisement {
  return {
    api: API_VERSION,
    uplMaxSize: settings.uploadMaxSize,
    options: {
      separator: PATH_SEPARATOR,
      disabled: [...settings.disabled],
      archivers: {
        create: [...settings.archivers.create],
        extract: [...settings.archivers.extract]
      },
      copyOverwrite: settings.copyOverwrite ? 1 : 0
    }
  };
}
