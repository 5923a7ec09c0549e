import { readFile } from 'fs/promises';
import { z } from 'zod';

const ClientEntrySchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().optional(),
  token_uri: z.string().optional(),
});

// Google Cloud console downloads desktop clients under `installed` and web
// clients under `web`.
const ClientSecretsFileSchema = z.union([
  z.object({ installed: ClientEntrySchema }).transform((file) => file.installed),
  z.object({ web: ClientEntrySchema }).transform((file) => file.web),
]);

export interface ClientSecrets {
  client_id: string;
  client_secret: string;
  token_uri?: string;
}

export async function loadClientSecrets(credentialsPath: string): Promise<ClientSecrets> {
  const content = await readFile(credentialsPath, 'utf-8');
  const entry = ClientSecretsFileSchema.parse(JSON.parse(content));
  return {
    client_id: entry.client_id,
    client_secret: entry.client_secret ?? '',
    token_uri: entry.token_uri,
  };
}
