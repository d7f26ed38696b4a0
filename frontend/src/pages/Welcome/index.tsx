import { Card, Col, Row, Typography, List } from 'antd';
import { useNavigate } from 'react-router-dom';
import { getConfig } from '@/config';
import { TOOL_PAGES } from '@/pages/registry';
import { formatFileSize } from '@/utils/format';
import { MAX_UPLOAD_BYTES } from '@/constants';
import styles from './Welcome.module.css';

const { Title, Paragraph, Text } = Typography;

const HOW_TO_USE = [
  'Select a tool from the navigation menu',
  'Follow the instructions specific to each tool',
  'Upload images when required',
  'Adjust parameters as needed',
  'Download your processed results',
];

const USAGE_TIPS = [
  'For best results, use high-quality input images',
  'Be specific in your text descriptions',
  'Check image dimensions before processing',
  'Larger images and more outputs take longer to generate',
];

/**
 * Landing page
 */
export default function WelcomePage() {
  const navigate = useNavigate();
  const { modelName } = getConfig();

  const supportedFormats = [
    'Input formats: PNG, JPEG',
    'Output formats: PNG, JPEG',
    `Maximum file size: ${formatFileSize(MAX_UPLOAD_BYTES)}`,
  ];

  return (
    <div className={styles.container}>
      <Title level={2}>Welcome to Image Processing Tools</Title>
      <Paragraph type="secondary">
        A toolkit for generating and editing images with the <Text strong>{modelName}</Text> model.
      </Paragraph>

      <Title level={4} className={styles.section}>
        Available Tools
      </Title>
      <Row gutter={[16, 16]}>
        {TOOL_PAGES.map((page) => (
          <Col key={page.path} xs={24} sm={12} lg={8}>
            <Card hoverable bordered={false} onClick={() => navigate(page.path)} className={styles.toolCard}>
              <Card.Meta
                avatar={<span className={styles.toolIcon}>{page.icon}</span>}
                title={page.title}
                description={page.summary}
              />
            </Card>
          </Col>
        ))}
      </Row>

      <Row gutter={[24, 24]} className={styles.section}>
        <Col xs={24} md={8}>
          <List
            header={<Text strong>How to Use</Text>}
            dataSource={HOW_TO_USE}
            renderItem={(item, index) => (
              <List.Item>
                {index + 1}. {item}
              </List.Item>
            )}
          />
        </Col>
        <Col xs={24} md={8}>
          <List
            header={<Text strong>Supported Formats</Text>}
            dataSource={supportedFormats}
            renderItem={(item) => <List.Item>{item}</List.Item>}
          />
        </Col>
        <Col xs={24} md={8}>
          <List
            header={<Text strong>Tips</Text>}
            dataSource={USAGE_TIPS}
            renderItem={(item) => <List.Item>{item}</List.Item>}
          />
        </Col>
      </Row>
    </div>
  );
}
