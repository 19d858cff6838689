/*
 * Copyright (C) 2025-2026 flickleafy
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

/**
 * Prompt text for answer generation
 *
 * @packageDocumentation
 */

import { ContextItem } from '../models';

export const SYSTEM_PROMPT = 'You are a helpful assistant that answers questions based on provided context.';

export const FALLBACK_ANSWER = "I couldn't find relevant information to answer your question.";

/**
 * Format retrieved pairs in ranked order, separated by a blank line
 */
export function buildContextText(context: ContextItem[]): string {
  return context.map(item => `Q: ${item.instruction}\nA: ${item.output}`).join('\n\n');
}

export function buildPrompt(question: string, context: ContextItem[]): string {
  return `You are a knowledgeable assistant. Answer the user's question based on the following relevant information from the knowledge base.

Relevant Information:
${buildContextText(context)}

User Question: ${question}

Instructions:
- Answer based on the provided information and context only
- Provide comprehensive, detailed responses when the question requires it
- If the information doesn't fully answer the question, say so
- Synthesize information from multiple sources when relevant
- Maintain the tone and style of the knowledge base
- Use examples and explanations where helpful
- Never give any reference from quran

Answer:`;
}
