import type { ReactNode } from 'react';
import { Alert, Typography } from 'antd';
import { getConfig } from '@/config';
import styles from './ToolHeader.module.css';

const { Title, Text, Paragraph } = Typography;

interface ToolHeaderProps {
  icon: ReactNode;
  title: string;
  caption: string;
  children?: ReactNode;
  warning?: string;
  /** Extra lines for the model info box */
  info?: string[];
}

/**
 * Title, description and model info at the top of every tool page
 */
export function ToolHeader({ icon, title, caption, children, warning, info = [] }: ToolHeaderProps) {
  const { modelId } = getConfig();

  return (
    <div className={styles.header}>
      <Title level={3} className={styles.title}>
        <span className={styles.icon}>{icon}</span>
        {title}
      </Title>
      <Text type="secondary">{caption}</Text>
      {children && <div className={styles.description}>{children}</div>}
      {warning && <Alert type="warning" showIcon message={warning} className={styles.alert} />}
      <Alert
        type="info"
        className={styles.alert}
        message={`Model used: ${modelId}`}
        description={
          info.length > 0
            ? info.map((line) => (
                <Paragraph key={line} className={styles.infoLine}>
                  {line}
                </Paragraph>
              ))
            : undefined
        }
      />
    </div>
  );
}
