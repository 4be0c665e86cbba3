import type { AmazonProviderConfig, OpenshiftProviderConfig, ProviderConfig } from "@/config/schema";
import { AUTH_TYPES, ENDPOINT_ROLES } from "@/lib/constants";
import type { ConnectionConfiguration } from "@/lib/types";

export function openshiftEndpoint(
  role: string,
  authtype: string,
  hostname: string,
  port: number,
  token: string,
): ConnectionConfiguration {
  return {
    endpoint: { role, hostname, port },
    authentication: { authtype, auth_key: token },
  };
}

export function amazonEndpoint(
  role: string,
  authtype: string,
  userid: string,
  password: string,
): ConnectionConfiguration {
  return {
    endpoint: { role },
    authentication: { authtype, userid, password },
  };
}

function openshiftConnections(provider: OpenshiftProviderConfig): ConnectionConfiguration[] {
  const connections = [
    openshiftEndpoint(ENDPOINT_ROLES.DEFAULT, AUTH_TYPES.BEARER, provider.hostname, provider.port, provider.authToken),
  ];
  // Hawkular authenticates with the same service account token
  if (provider.metrics.enabled) {
    connections.push(
      openshiftEndpoint(
        ENDPOINT_ROLES.HAWKULAR,
        AUTH_TYPES.HAWKULAR,
        provider.metrics.hostname,
        provider.metrics.port,
        provider.authToken,
      ),
    );
  }
  return connections;
}

function amazonConnections(provider: AmazonProviderConfig): ConnectionConfiguration[] {
  return [amazonEndpoint(ENDPOINT_ROLES.DEFAULT, AUTH_TYPES.DEFAULT, provider.accessKeyId, provider.secretAccessKey)];
}

/** The desired connection configurations of a configured provider. */
export function buildConnections(provider: ProviderConfig): ConnectionConfiguration[] {
  switch (provider.type) {
    case "openshift-origin":
    case "openshift-enterprise":
      return openshiftConnections(provider);
    case "amazon":
      return amazonConnections(provider);
  }
}

export function providerRegion(provider: ProviderConfig): string | null {
  return provider.region ?? null;
}
