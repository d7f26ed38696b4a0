import { useRef, useState } from 'react';
import { Card, Form, Button, Slider, Space, Typography, Image, Row, Col, message } from 'antd';
import { ClearOutlined, HighlightOutlined, SendOutlined } from '@ant-design/icons';
import type { SourceImage } from '@/types';
import { useInpaintingStore } from '@/stores';
import { ToolHeader } from '@/components/ToolHeader';
import { ImageUpload } from '@/components/ImageUpload';
import { ResultGallery } from '@/components/ResultGallery';
import { MaskCanvas, type MaskCanvasHandle } from '@/components/MaskCanvas';
import { PromptFields, SeedField } from '@/components/GenerationFields';
import { canvasToSourceImage, renderMask, resizeToCanvas, type LoadedImage } from '@/utils/canvas';
import { fitWithin, type Size } from '@/utils/image';
import { formatDimensions } from '@/utils/format';
import { DEFAULTS, INPAINT_MAX_SIDE, INPUT_IMAGE_INFO } from '@/constants';
import styles from '../tool.module.css';

const { Text } = Typography;

interface InpaintingFieldValues {
  prompt: string;
  negativePrompt?: string;
  seed: number;
}

/** The image as it is edited and sent */
interface WorkingImage {
  source: SourceImage;
  url: string;
  original: Size;
}

interface SubmittedPreview {
  imageUrl: string;
  maskUrl: string;
}

function toWorkingImage(loaded: LoadedImage): WorkingImage {
  const original = { width: loaded.source.width, height: loaded.source.height };
  const size = fitWithin(original, INPAINT_MAX_SIDE);
  if (size.width === original.width && size.height === original.height) {
    return { source: loaded.source, url: loaded.previewUrl, original };
  }
  const canvas = resizeToCanvas(loaded.element, size);
  return { source: canvasToSourceImage(canvas), url: canvas.toDataURL('image/png'), original };
}

export default function InpaintingPage() {
  const result = useInpaintingStore((s) => s.result);
  const loading = useInpaintingStore((s) => s.loading);
  const error = useInpaintingStore((s) => s.error);
  const run = useInpaintingStore((s) => s.run);
  const reset = useInpaintingStore((s) => s.reset);
  const clearError = useInpaintingStore((s) => s.clearError);

  const [form] = Form.useForm<InpaintingFieldValues>();
  const maskRef = useRef<MaskCanvasHandle>(null);
  const [image, setImage] = useState<WorkingImage | null>(null);
  const [strokeWidth, setStrokeWidth] = useState(DEFAULTS.strokeWidth);
  const [submitted, setSubmitted] = useState<SubmittedPreview | null>(null);

  const handleLoaded = (loaded: LoadedImage) => {
    try {
      setImage(toWorkingImage(loaded));
      setSubmitted(null);
      reset();
    } catch (e) {
      console.error('[Canvas]', e);
      message.error('The image could not be prepared for editing');
    }
  };

  const handleSubmit = async () => {
    const values = await form.validateFields().catch(() => null);
    if (!values) return;
    const strokes = maskRef.current?.getStrokes();
    if (!image || !strokes) {
      message.warning('Please upload an image first');
      return;
    }
    const rendered = renderMask(strokes);
    if (!rendered.hasStrokes) {
      message.warning('Draw a mask over the area to edit');
      return;
    }
    setSubmitted({ imageUrl: image.url, maskUrl: rendered.maskUrl });
    await run({
      kind: 'inpainting',
      prompt: values.prompt,
      negativePrompt: values.negativePrompt,
      image: image.source,
      mask: rendered.mask,
      seed: values.seed,
    });
  };

  const resized =
    image && (image.original.width !== image.source.width || image.original.height !== image.source.height);

  return (
    <div className={styles.container}>
      <ToolHeader
        icon={<HighlightOutlined />}
        title="Image Inpainting"
        caption="Modify an image by changing the area inside a mask"
        info={[INPUT_IMAGE_INFO, `Images larger than ${INPAINT_MAX_SIDE} pixels on a side are scaled down first.`]}
      >
        Upload an image, paint over the area to replace, then describe what should appear there.
      </ToolHeader>

      <Card className={styles.formCard} bordered={false}>
        <ImageUpload onLoaded={handleLoaded} disabled={loading} />

        {image && (
          <>
            <div className={styles.preview}>
              <Space size="large" wrap>
                <Text type="secondary">Image size: {formatDimensions(image.source)}</Text>
                {resized && <Text type="warning">Resized from {formatDimensions(image.original)}</Text>}
              </Space>
              <MaskCanvas
                ref={maskRef}
                backgroundUrl={image.url}
                width={image.source.width}
                height={image.source.height}
                strokeWidth={strokeWidth}
                disabled={loading}
              />
            </div>
            <Row gutter={16} align="middle">
              <Col flex="auto">
                <Text>Stroke width</Text>
                <Slider min={1} max={25} value={strokeWidth} onChange={setStrokeWidth} disabled={loading} />
              </Col>
              <Col>
                <Button icon={<ClearOutlined />} onClick={() => maskRef.current?.clear()} disabled={loading}>
                  Clear mask
                </Button>
              </Col>
            </Row>
          </>
        )}

        <Form
          form={form}
          layout="vertical"
          initialValues={{
            prompt: 'Replace the masked area with a honey bee',
            negativePrompt: '',
            seed: DEFAULTS.seed,
          }}
          disabled={loading}
        >
          <SeedField />
          <PromptFields promptPlaceholder="What should appear inside the mask" />
        </Form>

        <Button
          type="primary"
          icon={<SendOutlined />}
          size="large"
          block
          loading={loading}
          disabled={!image}
          onClick={handleSubmit}
          className={styles.submitBtn}
        >
          {loading ? 'Generating...' : 'Generate Image'}
        </Button>
      </Card>

      {submitted && (
        <div className={styles.compare}>
          <Card size="small" title="Original image" bordered={false}>
            <Image src={submitted.imageUrl} alt="Original image" className={styles.previewImage} />
          </Card>
          <Card size="small" title="Mask image" bordered={false}>
            <Image src={submitted.maskUrl} alt="Mask image" className={styles.previewImage} />
          </Card>
        </div>
      )}

      <ResultGallery
        result={result}
        loading={loading}
        error={error}
        prefix="inpainting"
        onDismissError={clearError}
      />
    </div>
  );
}
