import { NextRequest, NextResponse } from 'next/server';
import { errorResponse } from '@/lib/http';
import { parseScenarioCsv } from '@/lib/scenario-csv';

export async function POST(request: NextRequest) {
  try {
    const formData = await request.formData();
    const file = formData.get('file');

    if (!file || typeof file === 'string') {
      return NextResponse.json({ error: 'No file provided' }, { status: 400 });
    }

    if (!file.name.toLowerCase().endsWith('.csv')) {
      return NextResponse.json({ error: 'File must be a CSV' }, { status: 400 });
    }

    const scenarios = parseScenarioCsv(await file.text());

    if (scenarios.length === 0) {
      return NextResponse.json({ error: 'No scenarios found in CSV' }, { status: 400 });
    }

    console.log(`Imported ${scenarios.length} pit scenarios from ${file.name}`);

    return NextResponse.json({ fileName: file.name, scenarios });
  } catch (error) {
    return errorResponse(error, 'Scenario upload error', 'Failed to import scenarios');
  }
}
