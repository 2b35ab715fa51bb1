import { attempt, remoteRejected, type Result } from '../errors.js';
import type { QueryParams, VcdTransport } from './client.js';
import { Platform } from './platform.js';
import { escapeFilterValue, queryRecords } from './query.js';
import { firstQueuedTask, type TaskSummary } from './task.js';
import {
  EntityType,
  type DhcpSpec,
  type DirectNetworkSpec,
  type IsolatedNetworkSpec,
  type NetworkSummary,
} from './types.js';
import { NSMAP, buildXml, compact, type XmlBuildObject, type XmlElement } from './xml.js';

/** linkType values reported by orgVdcNetwork query records. */
export const LinkType = {
  DIRECT: '0',
  ISOLATED: '2',
} as const;

type OrgVdcLinkType = typeof LinkType.DIRECT | typeof LinkType.ISOLATED;

const LINK_TYPE_LABEL: Record<OrgVdcLinkType, string> = {
  [LinkType.DIRECT]: 'Direct',
  [LinkType.ISOLATED]: 'Isolated',
};

export function toAdminHref(href: string): string {
  return href.replace('/api/vdc/', '/api/admin/vdc/').replace('/api/network/', '/api/admin/network/');
}

export function toUserHref(href: string): string {
  return href.replace('/api/admin/vdc/', '/api/vdc/').replace('/api/admin/network/', '/api/network/');
}

function ipRange(start?: string, end?: string): XmlBuildObject | undefined {
  if (start === undefined && end === undefined) {
    return undefined;
  }
  return compact({ StartAddress: start, EndAddress: end });
}

function dhcpService(dhcp: DhcpSpec): XmlBuildObject {
  return compact({
    IsEnabled: String(dhcp.enabled),
    DefaultLeaseTime: dhcp.defaultLeaseSeconds === undefined ? undefined : String(dhcp.defaultLeaseSeconds),
    MaxLeaseTime: dhcp.maxLeaseSeconds === undefined ? undefined : String(dhcp.maxLeaseSeconds),
    IpRange: ipRange(dhcp.rangeStart, dhcp.rangeEnd),
  });
}

/**
 * Org VDC network operations scoped to one virtual datacenter.
 */
export class Vdc {
  readonly href: string;

  constructor(
    private readonly client: VcdTransport,
    href: string
  ) {
    this.href = toUserHref(href);
  }

  createDirectlyConnectedNetwork(spec: DirectNetworkSpec): Promise<Result<TaskSummary>> {
    return attempt(async () => {
      const parent = await new Platform(this.client).getExternalNetworkReference(spec.parentExternalNetworkName);

      const body = buildXml('OrgVdcNetwork', {
        $: { xmlns: NSMAP.vcloud, name: spec.name },
        Description: spec.description ?? '',
        Configuration: {
          ParentNetwork: { $: { href: parent.href } },
          FenceMode: 'bridged',
        },
        IsShared: String(spec.isShared),
      });

      return this.postNetwork(body);
    });
  }

  createIsolatedNetwork(spec: IsolatedNetworkSpec): Promise<Result<TaskSummary>> {
    return attempt(async () => {
      const staticPool = ipRange(spec.ipRangeStart, spec.ipRangeEnd);
      const ipScope = compact({
        IsInherited: 'false',
        Gateway: spec.gatewayIp,
        Netmask: spec.netmask,
        Dns1: spec.primaryDns,
        Dns2: spec.secondaryDns,
        DnsSuffix: spec.dnsSuffix,
        IpRanges: staticPool ? { IpRange: staticPool } : undefined,
      });

      const body = buildXml(
        'OrgVdcNetwork',
        compact({
          $: { xmlns: NSMAP.vcloud, name: spec.name },
          Description: spec.description ?? '',
          Configuration: {
            IpScopes: { IpScope: ipScope },
            FenceMode: 'isolated',
          },
          ServiceConfig: spec.dhcp ? { DhcpService: dhcpService(spec.dhcp) } : undefined,
          IsShared: String(spec.isShared),
        })
      );

      return this.postNetwork(body);
    });
  }

  listDirectNetworks(): Promise<Result<NetworkSummary[]>> {
    return attempt(() => this.listNetworks(LinkType.DIRECT));
  }

  listIsolatedNetworks(): Promise<Result<NetworkSummary[]>> {
    return attempt(() => this.listNetworks(LinkType.ISOLATED));
  }

  deleteDirectNetwork(name: string, force: boolean): Promise<Result<TaskSummary>> {
    return attempt(() => this.deleteNetwork(name, LinkType.DIRECT, force));
  }

  deleteIsolatedNetwork(name: string, force: boolean): Promise<Result<TaskSummary>> {
    return attempt(() => this.deleteNetwork(name, LinkType.ISOLATED, force));
  }

  private async postNetwork(body: string): Promise<TaskSummary> {
    const created = await this.client.post(`${toAdminHref(this.href)}/networks`, body, EntityType.ORG_VDC_NETWORK);
    return firstQueuedTask(created);
  }

  private queryNetworks(linkType: OrgVdcLinkType, name?: string): Promise<XmlElement[]> {
    const conditions = [`vdc==${escapeFilterValue(this.href)}`, `linkType==${linkType}`];
    if (name !== undefined) {
      conditions.unshift(`name==${escapeFilterValue(name)}`);
    }
    return queryRecords(this.client, 'orgVdcNetwork', conditions.join(';'));
  }

  private async listNetworks(linkType: OrgVdcLinkType): Promise<NetworkSummary[]> {
    const records = await this.queryNetworks(linkType);
    return records.map((record) => ({ name: record.attributes.name ?? '' }));
  }

  private async deleteNetwork(name: string, linkType: OrgVdcLinkType, force: boolean): Promise<TaskSummary> {
    const records = await this.queryNetworks(linkType, name);
    const href = records.find((record) => record.attributes.name === name)?.attributes.href;
    if (!href) {
      throw remoteRejected(`${LINK_TYPE_LABEL[linkType]} org vdc network named '${name}' not found in the selected vdc.`);
    }
    const params: QueryParams | undefined = force ? { force: 'true' } : undefined;
    const task = await this.client.delete(toAdminHref(href), params);
    return firstQueuedTask(task);
  }
}
