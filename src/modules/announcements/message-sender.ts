/** Outbound text delivery used by the broadcast dispatcher. */
export abstract class MessageSender {
	/** Resolves once delivered; rejects when delivery finally failed. */
	abstract send(chatId: number, text: string): Promise<void>
}
