import { GatewayAdapter, GatewayConfig } from './gateway.adapter';
import { EvolutionAdapter } from './evolution.adapter';

export class GatewayFactory {
  static create(config: GatewayConfig): GatewayAdapter {
    switch (config.provider) {
      case 'evolution':
        return new EvolutionAdapter(config);
      default:
        throw new Error(`Unsupported gateway provider: ${String(config.provider)}`);
    }
  }
}
