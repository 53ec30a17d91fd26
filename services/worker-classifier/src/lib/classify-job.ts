/**
 * classify_document job handling, independent of the queue transport.
 */

import {
  detectOptionsFromRequest,
  detectTemplate,
  logger,
  type ClassifyDocumentJob,
  type DetectionContext,
  type TemplateDetectedJob,
} from '@layoutid/shared';

export async function classifyDocument(
  data: ClassifyDocumentJob,
  context: DetectionContext
): Promise<TemplateDetectedJob> {
  const { request } = data;

  const result = await detectTemplate(request.pdf_path, {
    ...detectOptionsFromRequest(request),
    context,
  });

  logger.info('Document classified', {
    pdf_path: request.pdf_path,
    template_id: result.template_id,
    confidence: result.confidence,
  });

  return {
    event_type: 'template.detected',
    correlation_id: data.correlation_id,
    pdf_path: request.pdf_path,
    result,
    detected_at: new Date().toISOString(),
  };
}

/** One detected event per submission, whatever the retry count */
export function detectedJobId(data: ClassifyDocumentJob): string {
  return `detected_${data.correlation_id}`;
}
