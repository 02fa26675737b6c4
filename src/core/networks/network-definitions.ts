import { NetworkKey } from './network-key.interfaces';

export interface INetworkDefinition {
  readonly key: NetworkKey;
  readonly displayName: string;
  readonly tokenSymbol: string;
  readonly coingeckoId: string;
  readonly explorerTxBaseUrl: string;
  readonly systemAddresses: readonly string[];
}

// Elector and config contracts live in the masterchain of every TVM network.
const TVM_ELECTOR_ADDRESS: string =
  '-1:3333333333333333333333333333333333333333333333333333333333333333';
const TVM_CONFIG_ADDRESS: string =
  '-1:5555555555555555555555555555555555555555555555555555555555555555';

const NETWORK_DEFINITIONS: Readonly<Record<NetworkKey, INetworkDefinition>> = {
  [NetworkKey.TON]: {
    key: NetworkKey.TON,
    displayName: 'TON',
    tokenSymbol: 'TON',
    coingeckoId: 'the-open-network',
    explorerTxBaseUrl: 'https://tonviewer.com/transaction/',
    systemAddresses: [TVM_ELECTOR_ADDRESS, TVM_CONFIG_ADDRESS],
  },
  [NetworkKey.EVERSCALE]: {
    key: NetworkKey.EVERSCALE,
    displayName: 'Everscale',
    tokenSymbol: 'EVER',
    coingeckoId: 'everscale',
    explorerTxBaseUrl: 'https://everscan.io/transactions/',
    systemAddresses: [TVM_ELECTOR_ADDRESS, TVM_CONFIG_ADDRESS],
  },
  [NetworkKey.VENOM]: {
    key: NetworkKey.VENOM,
    displayName: 'Venom',
    tokenSymbol: 'VENOM',
    coingeckoId: 'venom',
    explorerTxBaseUrl: 'https://venomscan.com/transactions/',
    systemAddresses: [TVM_ELECTOR_ADDRESS, TVM_CONFIG_ADDRESS],
  },
  [NetworkKey.HUMANODE]: {
    key: NetworkKey.HUMANODE,
    displayName: 'Humanode',
    tokenSymbol: 'HMND',
    coingeckoId: 'humanode',
    explorerTxBaseUrl: 'https://humanode.subscan.io/extrinsic/',
    systemAddresses: [],
  },
};

export const getNetworkDefinition = (networkKey: NetworkKey): INetworkDefinition => {
  return NETWORK_DEFINITIONS[networkKey];
};
