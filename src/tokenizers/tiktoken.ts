import { get_encoding, type Tiktoken, type TiktokenEncoding } from "tiktoken";
import { BaseTokenizer, type ChatMessage } from "./base";

/**
 * Tiktoken-based tokenizer (OpenAI's tokenizer)
 */
export class TiktokenTokenizer extends BaseTokenizer {
  readonly encodingName: TiktokenEncoding;
  private encoding: Tiktoken;

  constructor(encodingName: TiktokenEncoding = "o200k_base") {
    super();
    this.encodingName = encodingName;
    this.encoding = get_encoding(encodingName);
  }

  countMessageTokens(message: ChatMessage): number {
    const tokens = this.encoding.encode(`${message.role}${message.content}`);
    return tokens.length;
  }
}
