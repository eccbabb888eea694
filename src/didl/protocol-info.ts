/**
 * protocolInfo is `<protocol>:<network>:<contentFormat>:<additionalInfo>`.
 * For DLNA media the fourth field is a `;`-separated list of
 * `DLNA.ORG_*=value` parameters.
 */

export interface DlnaFlags {
  raw: string;
  senderPaced: boolean;
  timeBasedSeek: boolean;
  byteBasedSeek: boolean;
  playContainer: boolean;
  s0Increasing: boolean;
  interactive: boolean;
  dlnaV15: boolean;
}

export interface DlnaParameters {
  profileName?: string;
  operation?: {
    timeSeekSupported: boolean;
    rangeSeekSupported: boolean;
  };
  conversionIndication?: 'original' | 'transcoded';
  flags?: DlnaFlags;
  raw: Record<string, string>;
}

export interface ProtocolInfo {
  protocol: string;
  network: string;
  contentFormat: string;
  additionalInfo: string;
  dlna: DlnaParameters;
}

function parseDlnaFlags(value: string): DlnaFlags | undefined {
  // 8 hex digits of primary flags followed by 24 reserved digits
  if (!/^[0-9A-Fa-f]{32}$/.test(value)) {
    return undefined;
  }
  const flags = Number.parseInt(value.slice(0, 8), 16);
  const bit = (n: number): boolean => Math.floor(flags / 2 ** n) % 2 === 1;
  return {
    raw: value,
    senderPaced: bit(31),
    timeBasedSeek: bit(30),
    byteBasedSeek: bit(29),
    playContainer: bit(28),
    s0Increasing: bit(27),
    interactive: bit(23),
    dlnaV15: bit(20)
  };
}

function parseDlnaParameters(additionalInfo: string): DlnaParameters {
  const dlna: DlnaParameters = { raw: {} };
  if (additionalInfo === '' || additionalInfo === '*') {
    return dlna;
  }

  for (const param of additionalInfo.split(';')) {
    const separator = param.indexOf('=');
    if (separator <= 0) continue;
    const key = param.slice(0, separator).trim();
    const value = param.slice(separator + 1).trim();
    dlna.raw[key] = value;

    switch (key) {
      case 'DLNA.ORG_PN':
        dlna.profileName = value;
        break;
      case 'DLNA.ORG_OP': {
        const op = value.padStart(2, '0');
        dlna.operation = {
          timeSeekSupported: op[0] === '1',
          rangeSeekSupported: op[1] === '1'
        };
        break;
      }
      case 'DLNA.ORG_CI':
        dlna.conversionIndication = value === '1' ? 'transcoded' : 'original';
        break;
      case 'DLNA.ORG_FLAGS':
        dlna.flags = parseDlnaFlags(value);
        break;
    }
  }
  return dlna;
}

/**
 * Split a protocolInfo string into its fields. Missing trailing fields are ''.
 */
export function parseProtocolInfo(protocolInfo: string): ProtocolInfo {
  const [protocol = '', network = '', contentFormat = '', ...rest] = protocolInfo.split(':');
  const additionalInfo = rest.join(':');
  return {
    protocol,
    network,
    contentFormat,
    additionalInfo,
    dlna: parseDlnaParameters(additionalInfo)
  };
}

export function formatProtocolInfo(info: Pick<ProtocolInfo, 'protocol' | 'network' | 'contentFormat' | 'additionalInfo'>): string {
  return [info.protocol, info.network, info.contentFormat, info.additionalInfo].join(':');
}
