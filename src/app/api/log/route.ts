import { NextResponse } from 'next/server'

// Sink for logger entries sent from the browser
export async function POST(request: Request) {
  const logData: unknown = await request.json().catch(() => null)
  if (typeof logData !== 'object' || logData === null) {
    return NextResponse.json({ error: 'Invalid log entry' }, { status: 400 })
  }

  // This will appear in Cloud Run logs
  const severity = 'severity' in logData ? logData.severity : undefined
  if (severity === 'ERROR') {
    console.error(JSON.stringify(logData))
  } else if (severity === 'WARNING') {
    console.warn(JSON.stringify(logData))
  } else if (severity === 'DEBUG') {
    console.debug(JSON.stringify(logData))
  } else {
    console.log(JSON.stringify(logData))
  }

  return NextResponse.json({ success: true })
}
