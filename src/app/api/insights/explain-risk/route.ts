import { handleExplainRisk } from '@/lib/insights/http'
import { getRiskExplainer } from '@/lib/insights/server'

export const runtime = 'nodejs'
export const maxDuration = 30

// POST /api/insights/explain-risk — AI explanation of a stack's precomputed risk scores
export async function POST(request: Request) {
  return handleExplainRisk(request, getRiskExplainer)
}
