import * as sax from 'sax';
import { DEFAULT_ATTRIBUTE_PREFIX } from './encoder';
import { XmlSyntaxError } from './errors';
import { XmlNode, addChild, createNode } from './node';

export interface DecodeOptions {
  attributePrefix?: string;
}

interface Frame {
  node: XmlNode;
  text: string;
}

/**
 * Parses an XML document into a tree. The returned node is a synthetic root
 * whose only child is the document element.
 *
 * Attributes become leaf children labelled with the attribute prefix, ahead of
 * element children. Text and CDATA collect into the element's data, trimmed
 * when the element closes. Comments and processing instructions are dropped.
 */
export function decodeXml(content: string, options: DecodeOptions = {}): XmlNode {
  const attributePrefix = options.attributePrefix ?? DEFAULT_ATTRIBUTE_PREFIX;
  const root = createNode();
  const stack: Frame[] = [{ node: root, text: '' }];
  const top = () => stack[stack.length - 1];

  const parser = sax.parser(true, { trim: false, normalize: false });

  parser.onopentag = (tag) => {
    const node = createNode();
    for (const name of Object.keys(tag.attributes)) {
      addChild(node, attributePrefix + localName(name), createNode(attributeValue(tag.attributes[name])));
    }
    addChild(top().node, localName(tag.name), node);
    stack.push({ node, text: '' });
  };

  parser.ontext = (text) => {
    top().text += text;
  };

  parser.oncdata = (cdata) => {
    top().text += cdata;
  };

  parser.onclosetag = () => {
    const frame = stack.pop();
    if (frame) {
      frame.node.data = frame.text.trim();
    }
  };

  // sax reports position after the offending character; stop at the first error.
  parser.onerror = (err) => {
    const message = err.message.split('\n')[0];
    throw new XmlSyntaxError(message, parser.line, parser.column);
  };

  parser.write(content).close();
  return root;
}

function attributeValue(value: string | sax.QualifiedAttribute): string {
  return typeof value === 'string' ? value : value.value;
}

function localName(name: string): string {
  const idx = name.indexOf(':');
  return idx >= 0 ? name.substring(idx + 1) : name;
}
