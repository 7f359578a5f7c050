/**
 * ProxyConfigurator - turns a proxy URL into a transport configuration
 *
 * socks5h:// and socks4a:// let the proxy resolve hostnames,
 * socks5:// and socks4:// resolve them on this machine first.
 */

import type { Agent } from 'http';
import { SocksProxyAgent } from 'socks-proxy-agent';
import { InvalidProxyUrlError, redactCredentials } from '../../utils/errors';
import { logger } from '../../utils/logger';

export type DnsResolution = 'proxy' | 'local';

export interface DirectTransport {
    readonly kind: 'direct';
}

export interface SocksTransport {
    readonly kind: 'socks';
    readonly socksVersion: 4 | 5;
    readonly host: string;
    readonly port: number;
    readonly dnsResolution: DnsResolution;
    readonly userId?: string;
    readonly password?: string;
}

export type TransportConfig = DirectTransport | SocksTransport;

const DEFAULT_SOCKS_PORT = 1080;

const SCHEMES: Record<string, { socksVersion: 4 | 5; dnsResolution: DnsResolution }> = {
    'socks5h:': { socksVersion: 5, dnsResolution: 'proxy' },
    'socks5:': { socksVersion: 5, dnsResolution: 'local' },
    'socks4a:': { socksVersion: 4, dnsResolution: 'proxy' },
    'socks4:': { socksVersion: 4, dnsResolution: 'local' },
};

export class ProxyConfigurator {
    /**
     * Transport that talks to remote hosts directly
     */
    static direct(): TransportConfig {
        return Object.freeze({ kind: 'direct' });
    }

    /**
     * Parse a proxy URL, or return a direct transport when none is given
     */
    static fromOptional(proxyUrl: string | undefined): TransportConfig {
        return proxyUrl ? ProxyConfigurator.parse(proxyUrl) : ProxyConfigurator.direct();
    }

    static parse(proxyUrl: string): TransportConfig {
        let url: URL;
        try {
            url = new URL(proxyUrl.trim());
        } catch {
            throw new InvalidProxyUrlError(proxyUrl, 'not a valid URL');
        }

        const scheme = SCHEMES[url.protocol.toLowerCase()];
        if (!scheme) {
            throw new InvalidProxyUrlError(
                proxyUrl,
                `unsupported scheme "${url.protocol.replace(/:$/, '')}", expected socks5h, socks5, socks4a or socks4`,
            );
        }

        const host = url.hostname.replace(/^\[(.*)\]$/, '$1');
        if (!host) {
            throw new InvalidProxyUrlError(proxyUrl, 'missing host');
        }

        if ((url.pathname && url.pathname !== '/') || url.search || url.hash) {
            throw new InvalidProxyUrlError(proxyUrl, 'proxy URL must not carry a path, query or fragment');
        }

        // URL drops default ports only for special schemes, so port is verbatim here
        const port = url.port ? Number.parseInt(url.port, 10) : DEFAULT_SOCKS_PORT;
        if (!Number.isInteger(port) || port < 1 || port > 65535) {
            throw new InvalidProxyUrlError(proxyUrl, `port out of range: ${url.port}`);
        }

        if (scheme.socksVersion === 4 && url.password) {
            throw new InvalidProxyUrlError(proxyUrl, 'SOCKS4 does not support passwords');
        }

        const transport: SocksTransport = {
            kind: 'socks',
            socksVersion: scheme.socksVersion,
            host,
            port,
            dnsResolution: scheme.dnsResolution,
            ...(url.username ? { userId: decodeURIComponent(url.username) } : {}),
            ...(url.password ? { password: decodeURIComponent(url.password) } : {}),
        };

        logger.debug('Proxy configured', {
            proxy: redactCredentials(proxyUrl),
            dnsResolution: transport.dnsResolution,
        });

        return Object.freeze(transport);
    }

    /**
     * Rebuild the proxy URL for a SOCKS transport. The scheme carries
     * where DNS resolution happens.
     */
    static toProxyUrl(transport: SocksTransport): string {
        const scheme =
            transport.socksVersion === 5
                ? transport.dnsResolution === 'proxy' ? 'socks5h' : 'socks5'
                : transport.dnsResolution === 'proxy' ? 'socks4a' : 'socks4';
        const host = transport.host.includes(':') ? `[${transport.host}]` : transport.host;
        let auth = '';
        if (transport.userId !== undefined) {
            auth = encodeURIComponent(transport.userId);
            if (transport.password !== undefined) {
                auth += `:${encodeURIComponent(transport.password)}`;
            }
            auth += '@';
        }
        return `${scheme}://${auth}${host}:${transport.port}`;
    }

    /**
     * HTTP agent for a transport, undefined for direct connections
     */
    static createAgent(transport: TransportConfig): Agent | undefined {
        if (transport.kind === 'direct') {
            return undefined;
        }
        return new SocksProxyAgent(ProxyConfigurator.toProxyUrl(transport));
    }
}
