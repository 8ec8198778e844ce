import { CodeGeneratorRequest, FileDescriptorProto } from '@protobuf-ts/plugin-framework'

export function ordersFile(): FileDescriptorProto {
  return FileDescriptorProto.create({
    name: 'shop/v1/orders.proto',
    package: 'shop.v1',
    syntax: 'proto3',
    messageType: [
      {
        name: 'Order',
        field: [
          { name: 'order_id', number: 1, label: 1, type: 9 },
          { name: 'state', number: 2, label: 1, type: 14, typeName: '.shop.v1.Order.State' },
          { name: 'line_items', number: 3, label: 3, type: 11, typeName: '.shop.v1.Order.LineItem' },
        ],
        nestedType: [
          {
            name: 'LineItem',
            field: [
              { name: 'sku', number: 1, label: 1, type: 9 },
              { name: 'quantity', number: 2, label: 1, type: 13 },
            ],
          },
        ],
        enumType: [
          { name: 'State', value: [{ name: 'STATE_UNSPECIFIED', number: 0 }, { name: 'STATE_PAID', number: 1 }] },
        ],
      },
    ],
    service: [
      { name: 'OrderService', method: [{ name: 'GetOrder', inputType: '.shop.v1.Order', outputType: '.shop.v1.Order' }] },
    ],
  })
}

export function createOrdersRequest(parameter?: string): CodeGeneratorRequest {
  return CodeGeneratorRequest.create({
    parameter,
    fileToGenerate: ['shop/v1/orders.proto'],
    protoFile: [ordersFile()],
  })
}
