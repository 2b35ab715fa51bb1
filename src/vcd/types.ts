export interface ExternalNetworkSpec {
  name: string;
  vimServerName: string;
  /** Port group names in the order given; at least one. */
  portGroups: string[];
  gatewayIp: string;
  netmask: string;
  /** "start-end" strings in the order given; at least one. */
  ipRanges: string[];
  description?: string;
  primaryDns?: string;
  secondaryDns?: string;
  dnsSuffix?: string;
}

export interface ExternalNetworkUpdate {
  name: string;
  newName?: string;
  newDescription?: string;
}

export interface DirectNetworkSpec {
  name: string;
  parentExternalNetworkName: string;
  description?: string;
  isShared: boolean;
}

export interface DhcpSpec {
  enabled: boolean;
  defaultLeaseSeconds?: number;
  maxLeaseSeconds?: number;
  rangeStart?: string;
  rangeEnd?: string;
}

export interface IsolatedNetworkSpec {
  name: string;
  gatewayIp: string;
  netmask: string;
  description?: string;
  primaryDns?: string;
  secondaryDns?: string;
  dnsSuffix?: string;
  ipRangeStart?: string;
  ipRangeEnd?: string;
  dhcp?: DhcpSpec;
  isShared: boolean;
}

export interface NetworkSummary {
  name: string;
}

export const EntityType = {
  EXTERNAL_NETWORK: 'application/vnd.vmware.admin.vmwexternalnet+xml',
  ORG_VDC_NETWORK: 'application/vnd.vmware.vcloud.orgVdcNetwork+xml',
} as const;
