import { Card, Form, Button } from 'antd';
import { FontSizeOutlined, SendOutlined } from '@ant-design/icons';
import { useTextToImageStore } from '@/stores';
import { ToolHeader } from '@/components/ToolHeader';
import { ResultGallery } from '@/components/ResultGallery';
import {
  GenerationFields,
  PromptFields,
  generationFieldDefaults,
  toGenerationOptions,
  type GenerationFieldValues,
} from '@/components/GenerationFields';
import { CFG_SCALE_INFO } from '@/constants';
import styles from '../tool.module.css';

export default function TextToImagePage() {
  const result = useTextToImageStore((s) => s.result);
  const loading = useTextToImageStore((s) => s.loading);
  const error = useTextToImageStore((s) => s.error);
  const run = useTextToImageStore((s) => s.run);
  const clearError = useTextToImageStore((s) => s.clearError);

  const [form] = Form.useForm<GenerationFieldValues>();

  const handleSubmit = async () => {
    // field errors are shown inline by the form
    const values = await form.validateFields().catch(() => null);
    if (!values) return;
    await run({
      kind: 'textToImage',
      prompt: values.prompt,
      negativePrompt: values.negativePrompt,
      options: toGenerationOptions(values),
    });
  };

  return (
    <div className={styles.container}>
      <ToolHeader
        icon={<FontSizeOutlined />}
        title="Text-to-Image Generation"
        caption="Transform words into art: create visuals from a text description"
        warning="Larger image sizes and more images may increase processing time."
        info={[CFG_SCALE_INFO]}
      >
        Select the number of images, size and other parameters, then enter a prompt and optionally a
        negative prompt.
      </ToolHeader>

      <Card className={styles.formCard} bordered={false}>
        <Form
          form={form}
          layout="vertical"
          initialValues={{ ...generationFieldDefaults, prompt: 'A dog in a forest' }}
          disabled={loading}
        >
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
        prefix="text-to-image"
        onDismissError={clearError}
      />
    </div>
  );
}
