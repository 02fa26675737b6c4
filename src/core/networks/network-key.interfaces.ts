export enum NetworkKey {
  TON = 'ton',
  EVERSCALE = 'everscale',
  VENOM = 'venom',
  HUMANODE = 'humanode',
}

export const ALL_NETWORK_KEYS: readonly NetworkKey[] = [
  NetworkKey.TON,
  NetworkKey.EVERSCALE,
  NetworkKey.VENOM,
  NetworkKey.HUMANODE,
];

const NETWORK_KEY_ALIAS_MAP: Readonly<Record<string, NetworkKey>> = {
  ton: NetworkKey.TON,
  everscale: NetworkKey.EVERSCALE,
  ever: NetworkKey.EVERSCALE,
  venom: NetworkKey.VENOM,
  humanode: NetworkKey.HUMANODE,
  humo: NetworkKey.HUMANODE,
  hmnd: NetworkKey.HUMANODE,
};

export const parseNetworkKey = (rawValue: string): NetworkKey | null => {
  return NETWORK_KEY_ALIAS_MAP[rawValue.trim().toLowerCase()] ?? null;
};
