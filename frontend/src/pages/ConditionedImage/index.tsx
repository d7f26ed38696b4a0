import { useState } from 'react';
import { Card, Form, Button, Image, Select, Slider, Row, Col, Typography, message } from 'antd';
import { BorderInnerOutlined, SendOutlined } from '@ant-design/icons';
import type { ControlMode } from '@/types';
import { useConditionedImageStore } from '@/stores';
import { ToolHeader } from '@/components/ToolHeader';
import { ImageUpload } from '@/components/ImageUpload';
import { ResultGallery } from '@/components/ResultGallery';
import {
  GenerationFields,
  PromptFields,
  generationFieldDefaults,
  toGenerationOptions,
  type GenerationFieldValues,
} from '@/components/GenerationFields';
import type { LoadedImage } from '@/utils/canvas';
import { formatDimensions } from '@/utils/format';
import {
  CFG_SCALE_INFO,
  CONTROL_MODE_OPTIONS,
  CONTROL_STRENGTH_INFO,
  DEFAULTS,
  INPUT_IMAGE_INFO,
} from '@/constants';
import styles from '../tool.module.css';

const { Text } = Typography;

interface ConditionedFieldValues extends GenerationFieldValues {
  controlMode: ControlMode;
  controlStrength: number;
}

export default function ConditionedImagePage() {
  const result = useConditionedImageStore((s) => s.result);
  const loading = useConditionedImageStore((s) => s.loading);
  const error = useConditionedImageStore((s) => s.error);
  const run = useConditionedImageStore((s) => s.run);
  const clearError = useConditionedImageStore((s) => s.clearError);

  const [form] = Form.useForm<ConditionedFieldValues>();
  const [reference, setReference] = useState<LoadedImage | null>(null);

  const handleSubmit = async () => {
    const values = await form.validateFields().catch(() => null);
    if (!values) return;
    if (!reference) {
      message.warning('Please upload a reference image first');
      return;
    }
    await run({
      kind: 'conditionedImage',
      prompt: values.prompt,
      negativePrompt: values.negativePrompt,
      conditionImage: reference.source,
      controlMode: values.controlMode,
      controlStrength: values.controlStrength,
      options: toGenerationOptions(values),
    });
  };

  return (
    <div className={styles.container}>
      <ToolHeader
        icon={<BorderInnerOutlined />}
        title="Text-to-Image with Condition"
        caption="Generate an image that follows the layout of a reference image"
        warning="Larger image sizes and more images may increase processing time."
        info={[INPUT_IMAGE_INFO, CFG_SCALE_INFO, CONTROL_STRENGTH_INFO]}
      >
        Upload a reference image, choose how it guides the result, then describe the image to generate.
      </ToolHeader>

      <Card className={styles.formCard} bordered={false}>
        <ImageUpload onLoaded={(image) => setReference(image)} disabled={loading} label="Upload a reference image" />

        {reference && (
          <div className={styles.preview}>
            <Image src={reference.previewUrl} alt="Reference image" className={styles.previewImage} />
            <Text type="secondary">{formatDimensions(reference.source)}</Text>
          </div>
        )}

        <Form
          form={form}
          layout="vertical"
          initialValues={{
            ...generationFieldDefaults,
            prompt: 'A dog in a forest',
            controlMode: 'CANNY_EDGE',
            controlStrength: DEFAULTS.controlStrength,
          }}
          disabled={loading}
        >
          <Row gutter={16}>
            <Col xs={24} md={12}>
              <Form.Item name="controlMode" label="Control mode">
                <Select options={CONTROL_MODE_OPTIONS} />
              </Form.Item>
            </Col>
            <Col xs={24} md={12}>
              <Form.Item name="controlStrength" label="Control strength">
                <Slider min={0} max={1} step={0.1} />
              </Form.Item>
            </Col>
          </Row>
          <GenerationFields />
          <PromptFields promptPlaceholder="Describe the image to generate" />
        </Form>

        <Button
          type="primary"
          icon={<SendOutlined />}
          size="large"
          block
          loading={loading}
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
        prefix="conditioned-image"
        onDismissError={clearError}
      />
    </div>
  );
}
