import dotenv from 'dotenv';
import { loadConfig } from '../config';
import { signActorToken, signTransportToken } from '../middleware/auth';
import { parseChatId } from '../utils/validation';

// Prints a token for the chat transport:
//   issueToken transport   socket.io handshake token
//   issueToken <chatId>    API token acting as that chat
export function issueToken(arg: string | undefined, secret: string): string {
  if (arg === 'transport') return signTransportToken(secret);
  const chatId = parseChatId(arg);
  if (chatId === null) throw new Error('Usage: issueToken transport | issueToken <chatId>');
  return signActorToken(chatId, secret);
}

if (require.main === module) {
  dotenv.config();
  try {
    console.log(issueToken(process.argv[2], loadConfig().JWT_SECRET));
  } catch (err) {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  }
}
