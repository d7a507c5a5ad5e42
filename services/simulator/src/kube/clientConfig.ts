import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import YAML from "yaml";
import { z } from "zod";

import { appLogger } from "../observability/logger.js";
import { isFileNotFound, toError } from "../utils/errorUtils.js";

export const SERVICE_ACCOUNT_DIR = "/var/run/secrets/kubernetes.io/serviceaccount";

/**
 * Connection settings for an existing cluster, resolved from a kubeconfig
 * context or from the pod's service account.
 */
export type ClusterCredential = Readonly<{
  host: string;
  contextName?: string;
  namespace?: string;
  insecureSkipTLSVerify: boolean;
  tlsServerName?: string;
  caFile?: string;
  caData?: string;
  bearerToken?: string;
  bearerTokenFile?: string;
  clientCertificateFile?: string;
  clientCertificateData?: string;
  clientKeyFile?: string;
  clientKeyData?: string;
  username?: string;
  password?: string;
}>;

export type ClientConfigLoadingOptions = {
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  serviceAccountDir?: string;
};

export class CredentialError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CredentialError";
  }
}

const ClusterSchema = z.object({
  server: z.string().optional(),
  "certificate-authority": z.string().optional(),
  "certificate-authority-data": z.string().optional(),
  "insecure-skip-tls-verify": z.boolean().optional(),
  "tls-server-name": z.string().optional(),
});
type Cluster = z.infer<typeof ClusterSchema>;

const AuthInfoSchema = z.object({
  token: z.string().optional(),
  tokenFile: z.string().optional(),
  "client-certificate": z.string().optional(),
  "client-certificate-data": z.string().optional(),
  "client-key": z.string().optional(),
  "client-key-data": z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
});
type AuthInfo = z.infer<typeof AuthInfoSchema>;

const ContextSchema = z.object({
  cluster: z.string(),
  user: z.string().optional(),
  namespace: z.string().optional(),
});
type Context = z.infer<typeof ContextSchema>;

const KubeconfigSchema = z.object({
  "current-context": z.string().nullish(),
  clusters: z.array(z.object({ name: z.string(), cluster: ClusterSchema })).nullish(),
  users: z.array(z.object({ name: z.string(), user: AuthInfoSchema })).nullish(),
  contexts: z.array(z.object({ name: z.string(), context: ContextSchema })).nullish(),
});
type Kubeconfig = z.infer<typeof KubeconfigSchema>;

// File references inside a kubeconfig are relative to the file that holds them.
type Located<T> = { value: T; baseDir: string };

type MergedKubeconfig = {
  currentContext?: string;
  clusters: Map<string, Located<Cluster>>;
  users: Map<string, Located<AuthInfo>>;
  contexts: Map<string, Context>;
};

function kubeconfigPaths(env: NodeJS.ProcessEnv, homeDir: string): string[] {
  const fromEnv = env.KUBECONFIG?.trim();
  if (fromEnv) {
    const entries = fromEnv
      .split(path.delimiter)
      .map(entry => entry.trim())
      .filter(entry => entry.length > 0);
    return [...new Set(entries)];
  }
  return [path.join(homeDir, ".kube", "config")];
}

function readKubeconfig(filePath: string): Kubeconfig | undefined {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    if (isFileNotFound(error)) {
      return undefined;
    }
    throw new CredentialError(`read kubeconfig ${filePath}: ${toError(error).message}`, { cause: error });
  }
  let document: unknown;
  try {
    document = YAML.parse(raw, { version: "1.1" });
  } catch (error) {
    throw new CredentialError(`parse kubeconfig ${filePath}: ${toError(error).message}`, { cause: error });
  }
  const parsed = KubeconfigSchema.safeParse(document ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new CredentialError(`parse kubeconfig ${filePath}: ${detail}`, { cause: parsed.error });
  }
  return parsed.data;
}

function setIfAbsent<T>(target: Map<string, T>, key: string, value: T): void {
  if (!target.has(key)) {
    target.set(key, value);
  }
}

/**
 * Merges kubeconfig files in order. The first file to define a name wins, as
 * does the first non-empty current-context.
 */
function loadKubeconfigFiles(filePaths: readonly string[]): MergedKubeconfig {
  const merged: MergedKubeconfig = { clusters: new Map(), users: new Map(), contexts: new Map() };
  for (const filePath of filePaths) {
    const config = readKubeconfig(filePath);
    if (!config) {
      continue;
    }
    const baseDir = path.dirname(path.resolve(filePath));
    if (!merged.currentContext && config["current-context"]) {
      merged.currentContext = config["current-context"];
    }
    for (const entry of config.clusters ?? []) {
      setIfAbsent(merged.clusters, entry.name, { value: entry.cluster, baseDir });
    }
    for (const entry of config.users ?? []) {
      setIfAbsent(merged.users, entry.name, { value: entry.user, baseDir });
    }
    for (const entry of config.contexts ?? []) {
      setIfAbsent(merged.contexts, entry.name, entry.context);
    }
  }
  return merged;
}

function resolveReference(baseDir: string, reference: string | undefined): string | undefined {
  if (!reference) {
    return undefined;
  }
  return path.isAbsolute(reference) ? reference : path.resolve(baseDir, reference);
}

function credentialFromContext(config: MergedKubeconfig, contextName: string): ClusterCredential {
  const context = config.contexts.get(contextName);
  if (!context) {
    throw new CredentialError(`context "${contextName}" does not exist`);
  }
  const cluster = config.clusters.get(context.cluster);
  if (!cluster) {
    throw new CredentialError(`cluster "${context.cluster}" referenced by context "${contextName}" does not exist`);
  }
  const server = cluster.value.server?.trim();
  if (!server) {
    throw new CredentialError(`cluster "${context.cluster}" has no server defined`);
  }

  let user: Located<AuthInfo> | undefined;
  if (context.user) {
    user = config.users.get(context.user);
    if (!user) {
      throw new CredentialError(`user "${context.user}" referenced by context "${contextName}" does not exist`);
    }
  }
  const auth: AuthInfo = user?.value ?? {};
  const userDir = user?.baseDir ?? cluster.baseDir;

  return Object.freeze({
    host: server,
    contextName,
    namespace: context.namespace,
    insecureSkipTLSVerify: cluster.value["insecure-skip-tls-verify"] ?? false,
    tlsServerName: cluster.value["tls-server-name"],
    caFile: resolveReference(cluster.baseDir, cluster.value["certificate-authority"]),
    caData: cluster.value["certificate-authority-data"],
    bearerToken: auth.token,
    bearerTokenFile: resolveReference(userDir, auth.tokenFile),
    clientCertificateFile: resolveReference(userDir, auth["client-certificate"]),
    clientCertificateData: auth["client-certificate-data"],
    clientKeyFile: resolveReference(userDir, auth["client-key"]),
    clientKeyData: auth["client-key-data"],
    username: auth.username,
    password: auth.password,
  });
}

function joinHostPort(host: string, port: string): string {
  return host.includes(":") ? `[${host}]:${port}` : `${host}:${port}`;
}

function inClusterCredential(env: NodeJS.ProcessEnv, serviceAccountDir: string): ClusterCredential | undefined {
  const host = env.KUBERNETES_SERVICE_HOST?.trim();
  const port = env.KUBERNETES_SERVICE_PORT?.trim();
  if (!host || !port) {
    return undefined;
  }
  const tokenFile = path.join(serviceAccountDir, "token");
  let token: string;
  try {
    token = fs.readFileSync(tokenFile, "utf-8").trim();
  } catch (error) {
    if (isFileNotFound(error)) {
      return undefined;
    }
    throw new CredentialError(`read service account token: ${toError(error).message}`, { cause: error });
  }
  const caFile = path.join(serviceAccountDir, "ca.crt");
  return Object.freeze({
    host: `https://${joinHostPort(host, port)}`,
    insecureSkipTLSVerify: false,
    caFile: fs.existsSync(caFile) ? caFile : undefined,
    bearerToken: token,
    bearerTokenFile: tokenFile,
  });
}

/**
 * Resolves a credential for an existing cluster from the ambient environment:
 * the kubeconfig files named by `KUBECONFIG` (or `~/.kube/config`) and their
 * current context first, then the in-cluster service account.
 */
export function loadAmbientClusterCredential(options: ClientConfigLoadingOptions = {}): ClusterCredential {
  const env = options.env ?? process.env;
  const kubeconfig = loadKubeconfigFiles(kubeconfigPaths(env, options.homeDir ?? os.homedir()));
  if (kubeconfig.currentContext) {
    const credential = credentialFromContext(kubeconfig, kubeconfig.currentContext);
    appLogger.debug({ source: "kubeconfig", context: kubeconfig.currentContext }, "loaded cluster credential");
    return credential;
  }

  const inCluster = inClusterCredential(env, options.serviceAccountDir ?? SERVICE_ACCOUNT_DIR);
  if (inCluster) {
    appLogger.debug({ source: "in-cluster", host: inCluster.host }, "loaded cluster credential");
    return inCluster;
  }
  throw new CredentialError("invalid configuration: no configuration has been provided");
}
