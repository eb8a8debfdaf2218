/*
 * Copyright (C) 2025 Ontic Pte. Ltd. (realfast.ai)
 * Use of this software is governed by the Business Source License included in the LICENSE.TXT file and at www.mariadb.com/bsl11.
 */

import type { PromptDefinition, PromptHandler } from '../capabilities/capability.js'

export const reviewCodePrompt: PromptDefinition = {
  name: 'review_code',
  title: 'Review Code',
  description: 'Ask for a structured review of a code snippet',
  arguments: [
    { name: 'code', description: 'The code to review', required: true },
    { name: 'language', description: 'Language of the snippet, if known', required: false }
  ]
}

const REVIEW_CHECKLIST = [
  'Correctness and edge cases',
  'Error handling',
  'Naming and readability',
  'Tests that should accompany the change'
]

export const reviewCode: PromptHandler = (args) => {
  const { code = '', language } = args
  const subject = language ? `the following ${language} code` : 'the following code'
  const fence = language ?? ''

  const text = [
    `Please review ${subject}. Cover:`,
    ...REVIEW_CHECKLIST.map((item) => `- ${item}`),
    '',
    `\`\`\`${fence}`,
    code,
    '```'
  ].join('\n')

  return [{ role: 'user', content: { type: 'text', text } }]
}
