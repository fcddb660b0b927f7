import type { Message, MessageRole } from '../schema/index.js';
import { LedgerError } from '../utils/errors.js';

// ── Public types ─────────────────────────────────────────────

export interface MessageLedger {
  readonly size: number;
  append(role: MessageRole, content: string): number;
  /** Append an entry whose content may later be replaced with `setSlotContent`. */
  appendSlot(role: MessageRole, content: string): number;
  setSlotContent(id: number, content: string): void;
  get(id: number): Message;
  entries(): Message[];
  renderEntry(id: number): string;
  renderTranscript(excludeIds: ReadonlySet<number>): string;
}

// ── Rendering ────────────────────────────────────────────────

const ENTRY_RULE = '-'.repeat(28);

export function renderMessage(message: Message): string {
  return (
    `${ENTRY_RULE}\n` +
    `|MESSAGE(role="${message.role}", id=${String(message.id)})|\n` +
    `${message.content}\n`
  );
}

// ── Factory ──────────────────────────────────────────────────

export function createMessageLedger(): MessageLedger {
  // Position in this array is the id.
  const messages: Message[] = [];
  const slots = new Set<number>();

  function push(role: MessageRole, content: string): number {
    const id = messages.length;
    messages.push({
      id,
      role,
      content,
      timestamp: new Date().toISOString(),
    });
    return id;
  }

  function lookup(id: number): Message {
    const message = Number.isInteger(id) ? messages[id] : undefined;
    if (!message) {
      throw new LedgerError(
        `Message id ${String(id)} is out of range (ledger has ${String(messages.length)} entries)`,
        'UNKNOWN_MESSAGE',
      );
    }
    return message;
  }

  return {
    get size() {
      return messages.length;
    },

    append(role, content) {
      return push(role, content);
    },

    appendSlot(role, content) {
      const id = push(role, content);
      slots.add(id);
      return id;
    },

    setSlotContent(id, content) {
      const message = lookup(id);
      if (!slots.has(id)) {
        throw new LedgerError(
          `Message ${String(id)} (${message.role}) is immutable; only slot entries can be rewritten`,
          'NOT_A_SLOT',
        );
      }
      message.content = content;
    },

    get(id) {
      return { ...lookup(id) };
    },

    entries() {
      return messages.map((m) => ({ ...m }));
    },

    renderEntry(id) {
      return renderMessage(lookup(id));
    },

    renderTranscript(excludeIds) {
      let transcript = '';
      for (const message of messages) {
        if (excludeIds.has(message.id)) continue;
        transcript += renderMessage(message);
      }
      return transcript;
    },
  };
}
