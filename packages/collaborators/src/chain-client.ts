import type { ChainCollaborator } from "@meridian/core";
import { CollaboratorRejectedError } from "@meridian/errors";
import { z } from "zod";
import type { HttpClient } from "./http/index.js";

const RegisterResponseSchema = z.object({ did: z.string().min(1) });
const DidDocumentSchema = z.record(z.unknown());

/** Format of identifiers issued for hub agents. */
export function formatDid(namespace: string, agentId: string): string {
  return `did:${namespace}:local:${agentId}`;
}

/**
 * DID registration client for the chain service.
 */
export class HttpChainClient implements ChainCollaborator {
  constructor(
    private readonly http: HttpClient,
    private readonly namespace: string,
  ) {}

  async registerDid(agentId: string): Promise<string> {
    const response = await this.http.request(
      "/chain/did/register",
      {
        method: "POST",
        body: { agent_id: agentId, did: formatDid(this.namespace, agentId) },
      },
      RegisterResponseSchema,
    );
    return response.did;
  }

  async lookupDid(did: string): Promise<Readonly<Record<string, unknown>> | null> {
    try {
      return await this.http.request(
        `/chain/did/${encodeURIComponent(did)}`,
        { method: "GET" },
        DidDocumentSchema,
      );
    } catch (error) {
      if (error instanceof CollaboratorRejectedError && error.statusCode === 404) {
        return null;
      }
      throw error;
    }
  }
}
