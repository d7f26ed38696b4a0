import { useMemo, useState } from 'react';
import { Card, Form, Button, Select, Slider, Radio, Input, Row, Col, Image, Typography, message } from 'antd';
import { ExpandOutlined, SendOutlined } from '@ant-design/icons';
import type { OutPaintingMode, OutpaintingMask } from '@/types';
import { useOutpaintingStore } from '@/stores';
import { ToolHeader } from '@/components/ToolHeader';
import { ImageUpload } from '@/components/ImageUpload';
import { ResultGallery } from '@/components/ResultGallery';
import { PromptFields, SeedField } from '@/components/GenerationFields';
import { renderExpansion, type Expansion, type LoadedImage } from '@/utils/canvas';
import { placeWithin } from '@/utils/image';
import { formatDimensions } from '@/utils/format';
import { DEFAULTS, EXPANDED_IMAGE_SIZES, INPUT_IMAGE_INFO, OUTPAINTING_MODE_OPTIONS } from '@/constants';
import { LIMITS } from '@/utils/validation';
import styles from '../tool.module.css';

const { Text } = Typography;

type MaskType = OutpaintingMask['type'];

interface OutpaintingFieldValues {
  expandedSize: string;
  horizontal: number;
  vertical: number;
  maskType: MaskType;
  maskPrompt?: string;
  mode: OutPaintingMode;
  seed: number;
  prompt: string;
  negativePrompt?: string;
}

const initialValues: OutpaintingFieldValues = {
  expandedSize: EXPANDED_IMAGE_SIZES[0].value,
  horizontal: DEFAULTS.position,
  vertical: DEFAULTS.position,
  maskType: 'image',
  maskPrompt: '',
  mode: 'PRECISE',
  seed: DEFAULTS.seed,
  prompt: 'forest setting in the background with animals and plants',
  negativePrompt: '',
};

const positionMarks = { 0: 'Start', 0.5: 'Center', 1: 'End' };

export default function OutpaintingPage() {
  const result = useOutpaintingStore((s) => s.result);
  const loading = useOutpaintingStore((s) => s.loading);
  const error = useOutpaintingStore((s) => s.error);
  const run = useOutpaintingStore((s) => s.run);
  const reset = useOutpaintingStore((s) => s.reset);
  const clearError = useOutpaintingStore((s) => s.clearError);

  const [form] = Form.useForm<OutpaintingFieldValues>();
  const [image, setImage] = useState<LoadedImage | null>(null);

  const expandedSize = Form.useWatch('expandedSize', form) ?? initialValues.expandedSize;
  const horizontal = Form.useWatch('horizontal', form) ?? initialValues.horizontal;
  const vertical = Form.useWatch('vertical', form) ?? initialValues.vertical;
  const maskType = Form.useWatch('maskType', form) ?? initialValues.maskType;

  // re-rendered whenever the size or placement changes
  const expansion = useMemo<Expansion | null>(() => {
    if (!image) return null;
    const target = EXPANDED_IMAGE_SIZES.find((s) => s.value === expandedSize) ?? EXPANDED_IMAGE_SIZES[0];
    try {
      return renderExpansion(image.element, target, placeWithin(image.source, target, horizontal, vertical));
    } catch (e) {
      console.error('[Canvas]', e);
      return null;
    }
  }, [image, expandedSize, horizontal, vertical]);

  const handleLoaded = (loaded: LoadedImage) => {
    setImage(loaded);
    reset();
  };

  const handleSubmit = async () => {
    const values = await form.validateFields().catch(() => null);
    if (!values) return;
    if (!expansion) {
      message.warning('Please upload an image first');
      return;
    }
    const mask: OutpaintingMask =
      values.maskType === 'image'
        ? { type: 'image', image: expansion.mask }
        : { type: 'prompt', prompt: values.maskPrompt ?? '' };
    await run({
      kind: 'outpainting',
      prompt: values.prompt,
      negativePrompt: values.negativePrompt,
      image: expansion.image,
      mask,
      mode: values.mode,
      seed: values.seed,
    });
  };

  return (
    <div className={styles.container}>
      <ToolHeader
        icon={<ExpandOutlined />}
        title="Image Outpainting"
        caption="Extend an image beyond its borders"
        info={[INPUT_IMAGE_INFO]}
      >
        Upload an image, choose the expanded size and where the image sits, then describe the surroundings.
      </ToolHeader>

      <Card className={styles.formCard} bordered={false}>
        <ImageUpload onLoaded={handleLoaded} disabled={loading} />

        <Form form={form} layout="vertical" initialValues={initialValues} disabled={loading}>
          <Row gutter={16}>
            <Col xs={24} md={8}>
              <Form.Item name="expandedSize" label="Expanded image size">
                <Select options={EXPANDED_IMAGE_SIZES.map((s) => ({ value: s.value, label: s.value }))} />
              </Form.Item>
            </Col>
            <Col xs={24} md={8}>
              <Form.Item name="horizontal" label="Horizontal position">
                <Slider min={0} max={1} step={0.1} marks={positionMarks} />
              </Form.Item>
            </Col>
            <Col xs={24} md={8}>
              <Form.Item name="vertical" label="Vertical position">
                <Slider min={0} max={1} step={0.1} marks={positionMarks} />
              </Form.Item>
            </Col>
          </Row>

          {expansion && image && (
            <div className={styles.compare}>
              <Card size="small" title="Expanded image" bordered={false}>
                <Image src={expansion.imageUrl} alt="Expanded image" className={styles.previewImage} />
                <Text type="secondary">
                  {formatDimensions(image.source)} in {formatDimensions(expansion.image)}
                </Text>
              </Card>
              <Card size="small" title="Mask image" bordered={false}>
                <Image src={expansion.maskUrl} alt="Mask image" className={styles.previewImage} />
              </Card>
            </div>
          )}

          <Row gutter={16}>
            <Col xs={24} md={8}>
              <Form.Item name="maskType" label="Mask type">
                <Radio.Group optionType="button">
                  <Radio.Button value="image">Image</Radio.Button>
                  <Radio.Button value="prompt">Prompt</Radio.Button>
                </Radio.Group>
              </Form.Item>
            </Col>
            <Col xs={24} md={8}>
              <Form.Item name="mode" label="Outpainting mode">
                <Select options={OUTPAINTING_MODE_OPTIONS} />
              </Form.Item>
            </Col>
            <Col xs={24} md={8}>
              <SeedField />
            </Col>
          </Row>

          {maskType === 'prompt' && (
            <Form.Item
              name="maskPrompt"
              label="Mask prompt"
              rules={[{ required: true, whitespace: true, message: 'Please enter a mask prompt' }]}
            >
              <Input placeholder="The object to keep, e.g. a dog" maxLength={LIMITS.promptMaxLength} />
            </Form.Item>
          )}

          <PromptFields promptPlaceholder="Describe what surrounds the image" />
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

      <ResultGallery
        result={result}
        loading={loading}
        error={error}
        prefix="outpainting"
        onDismissError={clearError}
      />
    </div>
  );
}
