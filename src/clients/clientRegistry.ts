import { nanoid } from 'nanoid';
import type { ClientRepository } from '@/store/types';
import type { Client } from '@/types';

export function normalizeEmail(email: string): string {
    return email.trim().toLowerCase();
}

export class ClientRegistry {
    constructor(
        private readonly clients: ClientRepository,
        private readonly now: () => number = Date.now,
    ) {}

    /** Throws DuplicateClientError when the email is already registered. */
    async register(clientName: string, clientEmail: string): Promise<Client> {
        const client: Client = {
            id: nanoid(),
            clientName: clientName.trim(),
            clientEmail: normalizeEmail(clientEmail),
            registeredAt: this.now(),
        };
        await this.clients.insert(client);
        return client;
    }
}
