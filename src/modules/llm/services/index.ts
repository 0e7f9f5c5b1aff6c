export { SentenceChunker } from './chunker.service';
export { OpenAITokenSource } from './llm.service';
